export {
  BackendLive,
  BackendFrom,
  PrettyLoggerLive,
  withRuntime,
} from "./layers.js";

export {
  prettyLogger,
  formatLogLine,
  withSpan,
  parseLogLevel,
} from "./logging.js";

export { type Env, loadConfig } from "./config.js";
