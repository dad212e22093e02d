/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription } from './exit-codes';

// Errors
export {
  ParseError,
  ToolError,
  PlanValidationError,
  ModelUnavailableError,
  ModelCallError,
  InvalidTransitionError,
  StateFrozenError,
  ConfigError,
  errorMessage,
} from './errors';

// Process runner interface
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';

// File system interface
export type { FileSystem, WriteOptions, FileSystemError, FileSystemErrorCode } from './file-system';
export { createFileSystemError } from './file-system';

// Prompter interface
export type { Prompter, InputOptions, PrompterError, PrompterErrorCode } from './prompter';
export { createPrompterError } from './prompter';

// Clock interface
export type { Clock } from './clock';
export { SystemClock, MockClock, TimeoutError } from './clock';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export { shouldLog, levelForEvent, DEFAULT_REDACT_PATTERNS, redactSecrets } from './logger';

// Agent configuration
export type {
  AgentConfig,
  ModelProvider,
  SessionLimits,
  JudgeThresholds,
  TimeoutConfig,
  ModelConfig,
  SearchConfig,
  VerbosityConfig,
  InteractivityConfig,
  PathConfig,
  ConfigSource,
} from './agent-config';
export { DEFAULT_CONFIG, MODEL_PROVIDERS, ARTIFACT_DIR_NAME, isModelProvider } from './agent-config';
