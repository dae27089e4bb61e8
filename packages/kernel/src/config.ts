// Configuration — engine settings loaded from environment variables
// Layered config: schema defaults → env vars → explicit overrides

import { z } from "zod";

/** Logging configuration */
export const LoggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  pretty: z.boolean().default(process.env.NODE_ENV !== "production"),
  file: z.string().optional(),
});

/** Security engine runtime settings */
export const EngineConfigSchema = z.object({
  /** Maximum number of security events kept in memory before the oldest are trimmed */
  eventLogLimit: z.number().int().min(1).max(1_000_000).default(1000),
  /** Refuse permissive presets and noisy log levels */
  enforceProductionHardening: z.boolean().default(false),
  /** Explicit opt-in that lets the permissive preset load under hardening */
  allowPermissivePolicy: z.boolean().default(false),
});

/** Full settings schema */
export const KernelSettingsSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  engine: EngineConfigSchema.default({}),
});

export type KernelSettings = z.infer<typeof KernelSettingsSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** Input accepted by loadKernelSettings overrides */
export interface KernelSettingsOverrides {
  logging?: Partial<LoggingConfig>;
  engine?: Partial<EngineConfig>;
}

/** Error thrown when settings fail schema validation */
export class KernelConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[], cause?: Error) {
    super(["Invalid taskguard settings:", ...issues.map((issue) => `- ${issue}`)].join("\n"), {
      cause,
    });
    this.name = "KernelConfigError";
    this.issues = issues;
  }
}

/** Environment variable mappings */
const ENV_MAPPINGS: Record<string, string> = {
  LOG_LEVEL: "logging.level",
  LOG_PRETTY: "logging.pretty",
  LOG_FILE: "logging.file",
  TASKGUARD_EVENT_LOG_LIMIT: "engine.eventLogLimit",
  ENFORCE_PRODUCTION_HARDENING: "engine.enforceProductionHardening",
  ALLOW_PERMISSIVE_POLICY: "engine.allowPermissivePolicy",
};

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Set a nested value in an object using dot notation */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split(".");
  const lastKey = keys.pop();
  if (lastKey === undefined) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

const BOOLEAN_PATHS = new Set([
  "logging.pretty",
  "engine.enforceProductionHardening",
  "engine.allowPermissivePolicy",
]);

/** Parse an on/off flag; unrecognised values pass through for the schema to reject */
function parseFlag(value: string): unknown {
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return value;
}

/** Parse environment value to appropriate type */
function parseEnvValue(value: string): unknown {
  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== "") return num;
  return value;
}

/** Collect settings from environment variables into a nested object */
function readEnvSettings(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const settings: Record<string, unknown> = {};
  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === "") continue;
    setNestedValue(settings, path, BOOLEAN_PATHS.has(path) ? parseFlag(raw) : parseEnvValue(raw));
  }
  return settings;
}

/**
 * Load engine settings from the environment, applying explicit overrides last.
 *
 * @throws KernelConfigError when a value fails validation
 */
export function loadKernelSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: KernelSettingsOverrides = {},
): KernelSettings {
  const fromEnv = readEnvSettings(env);
  const envLogging = isRecord(fromEnv.logging) ? fromEnv.logging : {};
  const envEngine = isRecord(fromEnv.engine) ? fromEnv.engine : {};

  const result = KernelSettingsSchema.safeParse({
    logging: { ...envLogging, ...overrides.logging },
    engine: { ...envEngine, ...overrides.engine },
  });

  if (!result.success) {
    throw new KernelConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      result.error,
    );
  }

  return result.data;
}

export function isProductionHardeningEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.ENFORCE_PRODUCTION_HARDENING;
  if (!value) return false;
  return TRUTHY.has(value.trim().toLowerCase());
}

export function isPermissivePolicyAllowed(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.ALLOW_PERMISSIVE_POLICY;
  if (!value) return false;
  return TRUTHY.has(value.trim().toLowerCase());
}

export function getProductionHardeningIssues(settings: KernelSettings): string[] {
  const issues: string[] = [];

  if (settings.logging.level === "debug" || settings.logging.level === "trace") {
    issues.push('LOG_LEVEL must not be "debug" or "trace" in production.');
  }

  if (settings.engine.eventLogLimit < 100) {
    issues.push("TASKGUARD_EVENT_LOG_LIMIT must keep at least 100 events in production.");
  }

  return issues;
}

export function assertProductionHardening(settings: KernelSettings): void {
  const issues = getProductionHardeningIssues(settings);
  if (issues.length === 0) return;

  const message = [
    "Production hardening checks failed:",
    ...issues.map((issue) => `- ${issue}`),
  ].join("\n");
  throw new Error(message);
}
