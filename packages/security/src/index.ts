// @taskguard/security — policy engine for agent file access and shell commands

export {
  CommandSandbox,
  MAX_INPUT_LENGTH,
  createCommandSandbox,
  type CommandSandboxOptions,
  type CreateCommandSandboxOptions,
} from "./command-sandbox.js";
export {
  DANGEROUS_PATTERNS,
  DANGEROUS_PATTERN_TABLE_VERSION,
  findDangerousPatterns,
  type DangerousPattern,
} from "./dangerous-patterns.js";
export { SecurityConfigError } from "./errors.js";
export {
  DEFAULT_EVENT_LOG_LIMIT,
  SecurityEventLog,
  type SecurityEventLogOptions,
} from "./event-log.js";
export { inspectFileSize } from "./file-size.js";
export {
  canonicalizePath,
  escapesBoundaries,
  expandHome,
  hasTraversalSegment,
  isWithinDirectory,
  toAbsolutePath,
  tryCanonicalizePath,
} from "./path-utils.js";
export {
  SecurityConfigSchema,
  expandEnvVars,
  parseSecurityConfig,
  parseSecurityConfigDocument,
  type ParseSecurityConfigDocumentOptions,
  type ParseSecurityConfigOptions,
  type PolicyDocumentFormat,
  type SecurityConfigDocument,
} from "./policy-document.js";
export {
  DEFAULT_ALLOWED_COMMANDS,
  DEFAULT_BLOCKED_PATTERNS,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_RESTRICTED_PATHS,
  HARDENED_MAX_FILE_SIZE,
  HARDENED_RESTRICTED_PATHS,
  RELAXED_MAX_FILE_SIZE,
  SECURITY_PRESETS,
  SecurityConfig,
  extractExecutable,
  type RestrictedPathOptions,
  type SecurityConfigData,
  type SecurityConfigOverrides,
  type SecurityPreset,
} from "./security-config.js";
export {
  DEFAULT_DENY_PATTERNS,
  SENSITIVE_DIRECTORIES,
  TaskFileScope,
  createTaskFileScope,
  type TaskFileScopeOptions,
} from "./task-file-scope.js";
export { TaskScopedFileAccess } from "./task-scoped-file-access.js";
export {
  SECURITY_EVENT_TYPES,
  SECURITY_SEVERITIES,
  SecurityIssues,
  createBlockedEvent,
  createSecurityEvent,
  createSecurityIssue,
  createValidationResult,
  formatEvent,
  formatIssue,
  formatIssues,
  isBlockingSeverity,
  isUserVisible,
  maxSeverity,
  requiresConfirmation,
  severityRank,
  truncate,
  type ConfirmationLevel,
  type CreateSecurityEventInput,
  type SecurityEvent,
  type SecurityEventType,
  type SecurityIssue,
  type SecuritySeverity,
  type ValidationResult,
} from "./types.js";
