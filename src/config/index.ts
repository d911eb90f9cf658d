export { loadAppConfig } from "./loadConfig";
export { ConfigError } from "./errors";
