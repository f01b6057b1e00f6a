export * from "./config/load_dotenv";
export * from "./config/runtime_env";
export * from "./errors";
export * from "./logging";
export type * from "./types/connector";
export type * from "./types/issue";
