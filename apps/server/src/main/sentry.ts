import * as Sentry from "@sentry/node";
import { monitoringConfig } from "../shared/config/monitoring";
import { getLogger, toErrorPayload } from "../shared/logger";

const logger = getLogger("sentry");

let serverInitialised = false;
let handlersRegistered = false;

export const initServerSentry = () => {
  if (!monitoringConfig.sentry.enabled) {
    logger.debug("Sentry disabled by configuration");
    return;
  }
  if (serverInitialised) {
    return;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    beforeSend: monitoringConfig.sentry.beforeSend,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
  });

  Sentry.setTag("process", "gesture-server");
  Sentry.setContext("runtime", {
    pid: process.pid,
    platform: process.platform,
    node: process.versions.node,
  });

  serverInitialised = true;
  logger.info("Sentry initialised", {
    environment: monitoringConfig.environment,
  });
};

export const captureServerException = (
  error: unknown,
  context: Record<string, unknown> = {},
) => {
  if (!serverInitialised) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));

  Sentry.captureException(normalisedError, { extra: context });
};

export const flushServerSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!serverInitialised) {
    return;
  }
  await Sentry.flush(timeoutMs);
};

const describeRejection = (reason: unknown): Error => {
  if (reason instanceof Error) {
    return reason;
  }
  if (typeof reason === "string") {
    return new Error(reason);
  }
  try {
    return new Error(JSON.stringify(reason));
  } catch {
    return new Error("unknown");
  }
};

export const registerProcessHandlers = () => {
  if (handlersRegistered) {
    return;
  }
  handlersRegistered = true;

  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception", toErrorPayload(error));
    captureServerException(error);
  });

  process.on("unhandledRejection", (reason) => {
    const error = describeRejection(reason);
    logger.fatal("Unhandled rejection", toErrorPayload(error));
    captureServerException(error);
  });
};
