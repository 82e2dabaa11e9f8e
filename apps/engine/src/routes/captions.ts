import { Router } from "express";
import type { CaptionsResponse } from "@reelsmith/shared";
import { allocateCues, fitCuesToDuration } from "../captions/timing";
import { toSrt } from "../captions/subtitles";
import { parseCaptionsRequest } from "../pipeline/validate";

const router = Router();

router.post("/captions", (req, res) => {
  const request = parseCaptionsRequest(req.body);
  const cues = fitCuesToDuration(
    allocateCues(request.text, request.duration, { wordsPerChunk: request.wordsPerChunk }),
    request.duration
  );
  const body: CaptionsResponse = { cues, srt: toSrt(cues) };
  res.json(body);
});

export { router as captionsRouter };
