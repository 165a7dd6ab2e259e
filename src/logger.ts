import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({ name: "refdata-ingest", level });
}

// Used by components built without a core; cores log at `IngestConfig.logLevel`
export const logger: Logger = createLogger();

export function childLogger(parent: Logger | undefined, component: string): Logger {
  return (parent ?? logger).child({ component });
}
