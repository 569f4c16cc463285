/**
 * Pure utility functions shared by the pipeline and its entry points
 */

export { Deadline, type Clock } from "./deadline";
export { clampInt } from "./limits";
export {
  createLogger,
  rootLogger,
  loggerOptions,
  REDACT_PATHS,
  type Logger,
} from "./logger";
