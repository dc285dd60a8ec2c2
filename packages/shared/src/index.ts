export { createLogger, isLogLevel } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { KeyedLock, withProcessLock } from "./locking/keyed-lock.js";
export { acquireFileLock, withFileLock, FileLockTimeoutError } from "./locking/file-lock.js";
export type { FileLockOptions } from "./locking/file-lock.js";

export { writeFileAtomic, readTextIfExists, isMissingFile } from "./fs/atomic-write.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  DEFAULT_SYSTEM_PROMPT,
  MemoryConfigSchema,
  LlmConfigSchema,
  RunnerConfigSchema,
} from "./utils/config-schema.js";
export type { MemoryConfig, LlmConfig, RunnerConfig } from "./utils/config-schema.js";
