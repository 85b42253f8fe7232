import { parseBooleanFlag } from "../env";
import { isRecord } from "../validation/eventRecords";

type Environment = string;
type RuntimeEnv = Record<string, string | undefined>;

export type ScrubbableEvent = {
  extra?: Record<string, unknown>;
  contexts?: Record<string, unknown>;
  request?: unknown;
  user?: { id?: string | number };
  breadcrumbs?: Array<{ data?: Record<string, unknown> }>;
};

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.APP_ENV ?? env.TAPMETER_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV ?? "development";
  if (nodeEnv.trim().length > 0) {
    return nodeEnv;
  }

  return "development";
};

const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "email",
  "phone",
];

const isSensitiveKey = (key: string): boolean => {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
};

const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (isRecord(value)) {
    return scrubRecord(value);
  }

  if (typeof value === "string" && isSensitiveKey(value)) {
    return "[redacted]";
  }

  return value;
};

export const scrubRecord = (
  record: Record<string, unknown>,
): Record<string, unknown> => {
  const result: Record<string, unknown> = {};

  Object.entries(record).forEach(([key, nestedValue]) => {
    if (isSensitiveKey(key)) {
      result[key] = "[redacted]";
      return;
    }

    result[key] = scrubValue(nestedValue);
  });

  return result;
};

/**
 * Strips request payloads and user details other than the id, then redacts
 * sensitive keys in extras, contexts and breadcrumb data.
 */
export const scrubEvent = <T extends ScrubbableEvent>(event: T): T => {
  const view: ScrubbableEvent = event;

  view.request = undefined;

  if (view.extra) {
    view.extra = scrubRecord(view.extra);
  }

  if (view.contexts) {
    view.contexts = scrubRecord(view.contexts);
  }

  if (view.breadcrumbs) {
    view.breadcrumbs = view.breadcrumbs.map((breadcrumb) =>
      breadcrumb.data
        ? { ...breadcrumb, data: scrubRecord(breadcrumb.data) }
        : breadcrumb,
    );
  }

  if (view.user) {
    view.user =
      view.user.id != null ? { id: String(view.user.id) } : undefined;
  }

  return event;
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    enableInDevelopment: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
    consoleOnly: boolean;
  };
};

export const resolveMonitoringConfig = (
  runtimeEnv: RuntimeEnv,
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? "";
  const sentryEnabled =
    Boolean(sentryDsn) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_SENTRY_IN_DEV, false));

  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? "";
  const logtailEnabled =
    Boolean(logtailToken) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV, false));

  const parsedSampleRate = Number.parseFloat(
    runtimeEnv.SENTRY_TRACES_SAMPLE_RATE ?? "0.1",
  );

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled: sentryEnabled,
      enableInDevelopment: parseBooleanFlag(
        runtimeEnv.ENABLE_SENTRY_IN_DEV,
        false,
      ),
      tracesSampleRate: Number.isNaN(parsedSampleRate) ? 0.1 : parsedSampleRate,
    },
    logtail: {
      token: logtailToken,
      enabled: logtailEnabled,
      consoleOnly: !logtailEnabled,
    },
  };
};

let cachedConfig: MonitoringConfig | null = null;

// Resolved on first use so a .env file loaded at startup is honoured.
export const getMonitoringConfig = (): MonitoringConfig => {
  if (!cachedConfig) {
    cachedConfig = resolveMonitoringConfig(process.env);
  }
  return cachedConfig;
};

export const resetMonitoringConfig = (): void => {
  cachedConfig = null;
};
