/**
 * @ledgerview/node — Package public API.
 *
 * Importing this module never starts a server; see main.ts.
 */

export { ReportService } from "./services/report-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
