export {
  debug,
  info,
  warn,
  error,
  withContext,
  resolveLogLevel,
  formatLine,
} from "./logger";
