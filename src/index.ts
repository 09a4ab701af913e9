export * from "./ban/index.js";
export type { Config, StoreConfig } from "./config/index.js";
export { MEMORY_STORE_PATH, parseConfig } from "./config/index.js";
export type { MigrationReport } from "./db/migrate.js";
