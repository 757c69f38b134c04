import type { NodeOptions } from "@sentry/node";
import { type RuntimeEnv, parseBooleanFlag, parseNumericEnv } from "../env";

export type SentryEvent = Parameters<NonNullable<NodeOptions["beforeSend"]>>[0];

type Environment = string;

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.APP_ENV ?? env.FACECUE_ENV;
  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv.trim();
  }

  const nodeEnv = env.NODE_ENV;
  if (nodeEnv && nodeEnv.trim().length > 0) {
    return nodeEnv.trim();
  }

  return "development";
};

// Frames and landmark lists are biometric data and never leave the process.
const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "email",
  "image",
  "landmarks",
  "frame_data",
];

const REDACTED = "[redacted]";

const isSensitiveKey = (key: string): boolean => {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
};

const scrubValue = (value: unknown): unknown => {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (typeof value === "object") {
    return scrubRecord({ ...value });
  }

  if (
    typeof value === "string" &&
    SENSITIVE_KEYS.some((sensitiveKey) =>
      value.toLowerCase().includes(sensitiveKey),
    )
  ) {
    return REDACTED;
  }

  return value;
};

export const scrubRecord = (
  record: Record<string, unknown>,
): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  for (const [key, nestedValue] of Object.entries(record)) {
    result[key] = isSensitiveKey(key) ? REDACTED : scrubValue(nestedValue);
  }
  return result;
};

export const sanitizeSentryEvent = (event: SentryEvent): SentryEvent => {
  const userId = event.user?.id;

  return {
    ...event,
    request: undefined,
    extra: event.extra ? scrubRecord(event.extra) : undefined,
    breadcrumbs: event.breadcrumbs?.map((breadcrumb) =>
      breadcrumb.data
        ? { ...breadcrumb, data: scrubRecord(breadcrumb.data) }
        : breadcrumb,
    ),
    user: userId === undefined || userId === null ? undefined : { id: String(userId) },
  };
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
    beforeSend: typeof sanitizeSentryEvent;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

export const createMonitoringConfig = (env: RuntimeEnv): MonitoringConfig => {
  const environment = resolveEnvironment(env);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = env.SENTRY_DSN ?? "";
  const logtailToken = env.BETTER_STACK_TOKEN ?? "";

  return {
    environment,
    release: env.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled:
        sentryDsn.length > 0 &&
        (isProductionLike || parseBooleanFlag(env.ENABLE_SENTRY_IN_DEV)),
      tracesSampleRate:
        parseNumericEnv(env.SENTRY_TRACES_SAMPLE_RATE, { min: 0, max: 1 }) ??
        0.1,
      beforeSend: sanitizeSentryEvent,
    },
    logtail: {
      token: logtailToken,
      enabled:
        logtailToken.length > 0 &&
        (isProductionLike || parseBooleanFlag(env.ENABLE_BETTER_STACK_IN_DEV)),
    },
  };
};

export const monitoringConfig: MonitoringConfig = createMonitoringConfig(
  process.env,
);

export const isSentryEnabled = () => monitoringConfig.sentry.enabled;
export const isLogtailEnabled = () => monitoringConfig.logtail.enabled;
export const getMonitoringEnvironment = () => monitoringConfig.environment;
