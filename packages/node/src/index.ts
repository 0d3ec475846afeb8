/**
 * @basketwrap/node - HTTP service for a basket-backed wrapper.
 *
 * @packageDocumentation
 */

export { WrapperService } from "./services/wrapper-service.js";
export type { WrapperServiceConfig, SandboxAsset } from "./services/wrapper-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
