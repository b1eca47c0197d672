export * from "./config";
export * from "./events";
export { defaultLogger, type Logger, type LogLevel, noopLogger } from "./logger";
export * from "./result";
export * from "./validation";
