import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

const GLOBAL_FLAG = "__reelEnvBootstrapLoaded";
const globalScope = globalThis as typeof globalThis & { [GLOBAL_FLAG]?: boolean };

const bootstrapRepoRoot = path.resolve(__dirname, "..", "..", "..", "..");
const bootstrapAppRoot = path.resolve(bootstrapRepoRoot, "apps", "engine");
const loadedEnvFiles: string[] = [];

function loadEnvFile(envPath: string) {
  if (!fs.existsSync(envPath)) return false;
  dotenv.config({ path: envPath, override: true });
  loadedEnvFiles.push(envPath);
  return true;
}

if (!globalScope[GLOBAL_FLAG]) {
  globalScope[GLOBAL_FLAG] = true;

  const candidates = [
    path.join(bootstrapRepoRoot, ".env"),
    path.join(bootstrapRepoRoot, ".env.local"),
    path.join(bootstrapAppRoot, ".env"),
    path.join(bootstrapAppRoot, ".env.local")
  ];

  for (const envPath of candidates) {
    loadEnvFile(envPath);
  }

  if (process.env.REEL_DEBUG_ENV_BOOTSTRAP === "1") {
    console.log(`[reel] envBootstrap loaded: ${loadedEnvFiles.join(", ") || "<none>"}`);
  }
}
