// Shared configuration, logging, and error base
export { BaseError } from "./errors.ts";
export { getEnv, resetEnv, envSchema, type Env } from "./env.ts";
export { logger, Logger, type LogLevel, type LogMeta } from "./logger.ts";
