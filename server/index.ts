import { createServerRuntime } from "./runtime/kernel.js";

const runtime = createServerRuntime();
runtime.start();

function shutdown(signal: NodeJS.Signals): void {
  console.log(`[server] Received ${signal}, shutting down`);
  runtime.stop();
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
