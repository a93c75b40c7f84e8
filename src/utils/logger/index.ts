export { Logger, logger, getLogger, type LogEntry, type LogLevel } from "./logger.js";
export { createLlmLoggingFetch } from "./fetch.js";
export { parseFetchRequestForLog, type ProviderFetch } from "./format.js";
