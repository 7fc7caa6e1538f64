export { createConfig, DEFAULT_CONFIG } from "./config";
export { readConfigEnv, loadConfig, CONFIG_ENV } from "./env";
export { identityConfigFrom, authorizationConfigFrom, authenticationConfigFrom } from "./slices";
export { ConfigError } from "./errors";
