import * as Sentry from "@sentry/node";
import { getMonitoringConfig, scrubEvent } from "./config/monitoring";
import { getLogger } from "./logger";

const logger = getLogger("sentry", "host");

let initialised = false;

export const initSentry = (): void => {
  const config = getMonitoringConfig();
  if (!config.sentry.enabled || initialised) {
    if (!config.sentry.enabled) {
      logger.debug("Skipping Sentry initialisation: disabled by configuration");
    }
    return;
  }

  Sentry.init({
    dsn: config.sentry.dsn,
    environment: config.environment,
    release: config.release,
    tracesSampleRate: config.sentry.tracesSampleRate,
    beforeSend: (event) => scrubEvent(event),
  });

  Sentry.setTag("component", "tracker");
  Sentry.setContext("runtime", {
    pid: process.pid,
    platform: process.platform,
    node: process.versions.node,
  });

  initialised = true;
};

export const captureException = (
  error: unknown,
  context?: Record<string, unknown>,
): void => {
  if (!initialised || !getMonitoringConfig().sentry.enabled) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));

  Sentry.captureException(normalisedError, {
    contexts: context ? { metadata: context } : undefined,
  });
};

export const flushSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!initialised) {
    return;
  }
  await Sentry.flush(timeoutMs);
};
