import "./lib/envBootstrap";
import { startServer } from "./index";

startServer({ inlineWorker: true }).catch((err) => {
  console.error("[reel] solo launcher failed to start", err);
  process.exit(1);
});
