import { createServer, type IncomingMessage } from "node:http";

export type RecordedRequest = {
  method: string;
  url: string;
  headers: IncomingMessage["headers"];
  body: string;
};

export type EmulatorReply = {
  status: number;
  body: string | Buffer;
  contentType?: string;
};

export type ProviderEmulator = {
  url: string;
  requests: RecordedRequest[];
  close: () => Promise<void>;
};

/**
 * Minimal stand-in for the TTS and story HTTP APIs. Each request takes the
 * next reply from `replies`; the last reply repeats.
 */
export async function startProviderEmulator(replies: EmulatorReply[]): Promise<ProviderEmulator> {
  const requests: RecordedRequest[] = [];

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      requests.push({
        method: req.method ?? "GET",
        url: req.url ?? "",
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf8")
      });
      const reply = replies[Math.min(requests.length - 1, replies.length - 1)] ?? { status: 404, body: "not found" };
      res.statusCode = reply.status;
      res.setHeader("Content-Type", reply.contentType ?? "application/json");
      res.end(reply.body);
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to start provider emulator");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}
