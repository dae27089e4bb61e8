// @taskguard/kernel — Foundation layer
// Provides engine settings and structured logging to the security layer

// Configuration
export {
  KernelSettingsSchema,
  LoggingConfigSchema,
  EngineConfigSchema,
  KernelConfigError,
  loadKernelSettings,
  isProductionHardeningEnabled,
  isPermissivePolicyAllowed,
  getProductionHardeningIssues,
  assertProductionHardening,
  type KernelSettings,
  type KernelSettingsOverrides,
  type LoggingConfig,
  type EngineConfig,
} from "./config.js";

// Logging
export {
  initLogger,
  createLogger,
  getLogger,
  flushLogs,
  isLevelEnabled,
  LOG_LEVELS,
  type Logger,
  type LogContext,
  type CreateLoggerOptions,
  type LogLevel,
} from "./logger.js";
