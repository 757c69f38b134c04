import "./loadEnv";
import {
  resolveServerAddress,
  resolveThresholdsPath,
} from "../shared/config/server";
import type { RuntimeEnv } from "../shared/env";
import { getLogger, toErrorPayload } from "../shared/logger";
import { GestureSocketServer } from "./gestureSocketServer";
import {
  captureServerException,
  flushServerSentry,
  initServerSentry,
  registerProcessHandlers,
} from "./sentry";
import { loadGestureConfig } from "./thresholdsLoader";

const logger = getLogger("main");

const startServer = async (env: RuntimeEnv): Promise<GestureSocketServer> => {
  const config = await loadGestureConfig({
    path: resolveThresholdsPath(env),
    env,
  });

  const address = resolveServerAddress(env);
  if (address.rejectedPort !== undefined) {
    logger.warn("Invalid FACECUE_PORT provided, using default", {
      value: address.rejectedPort,
      port: address.port,
    });
  }

  const server = new GestureSocketServer({
    host: address.host,
    port: address.port,
    config,
    reportError: captureServerException,
  });
  await server.listen();
  return server;
};

const flushMonitoring = async () => {
  await flushServerSentry();
  await logger.flush();
};

const main = async () => {
  initServerSentry();
  registerProcessHandlers();

  let server: GestureSocketServer;
  try {
    server = await startServer(process.env);
  } catch (error) {
    logger.fatal("Gesture server failed to start", toErrorPayload(error));
    captureServerException(error);
    await flushMonitoring();
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info("Shutdown requested", { signal });
    await server.close();
    await flushMonitoring();
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal)
      .catch((error: unknown) => {
        logger.error("Gesture server did not shut down cleanly", toErrorPayload(error));
        process.exitCode = 1;
      })
      .finally(() => {
        process.exit();
      });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
};

void main();
