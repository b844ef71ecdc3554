// pattern: Imperative Shell
// Shared CLI dependencies

export {
  CLI_LOGGER,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
