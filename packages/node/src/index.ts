/**
 * @wardwrap/node — Package public API.
 */

export { WrapperService } from "./services/wrapper-service.js";
export type {
  WrapperServiceConfig,
  TokenInfo,
  BalanceView,
  AllowanceView,
  EligibilityView,
  BackingView,
  RecoveryView,
  AttestationView,
} from "./services/wrapper-service.js";
export { loadConfig, parseApiKeys, serviceConfigFrom, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
