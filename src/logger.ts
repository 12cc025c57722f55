import { ILogObj, Logger } from "tslog";
import { loadLoggingConfig, type LoggingConfig } from "./config/env";

export type AppLogger = Logger<ILogObj>;

const LEVELS: Record<LoggingConfig["LOG_LEVEL"], number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6
};

export function createRootLogger(config: LoggingConfig): AppLogger {
  return new Logger<ILogObj>({
    name: "grounded-qa",
    minLevel: LEVELS[config.LOG_LEVEL],
    type: config.LOG_TYPE
  });
}

export const logger: AppLogger = createRootLogger(loadLoggingConfig());

export function componentLogger(name: string, parent: AppLogger = logger): AppLogger {
  return parent.getSubLogger({ name });
}
