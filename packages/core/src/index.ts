export * from "./types";
export * from "./errors";
export * from "./config";
export { loadEnvFiles } from "./env";
export { createLogger } from "./utils/logger";
export type { LogLevel, BaseLogPayload, ModuleLogger } from "./utils/logger";
