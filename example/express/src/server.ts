import express from "express";
import cors from "cors";
import { Logger } from "agentry-kernel";
import { SSETransport, createAgentryRouter } from "agentry-express";
import { loadConfig } from "./config";
import { setupEngine } from "./setup";

const config = loadConfig();

// Configures Logger before anything logs
const { engine, close } = setupEngine(config);
const transport = new SSETransport();

const log = Logger.for("Server");

const app = express();
app.use(cors());
app.use("/api", createAgentryRouter({ engine, transport, syncRunTimeoutMs: config.SYNC_RUN_TIMEOUT_MS }));

engine.start();

const server = app.listen(config.PORT, () => {
  log.info({ port: config.PORT }, "Server started");
  log.info({ url: `http://localhost:${config.PORT}/api/health` }, "Health check endpoint");
});

// =============================================================================
// Graceful Shutdown
// =============================================================================

let shuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ signal }, "Shutdown signal received");

  // Force close after timeout
  const forced = setTimeout(() => {
    log.error("Forced shutdown after timeout");
    process.exit(1);
  }, 10_000);
  forced.unref();

  transport.closeAll();
  await engine.stop();
  await close();

  server.close((err) => {
    if (err) {
      log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
    log.info("Server closed");
    process.exit(0);
  });
}

function onSignal(signal: NodeJS.Signals): void {
  gracefulShutdown(signal).catch((err: unknown) => {
    log.error({ err }, "Shutdown failed");
    process.exit(1);
  });
}

process.once("SIGTERM", onSignal);
process.once("SIGINT", onSignal);
