// Security config documents — validate host-supplied YAML/JSON or structured values
// The host reads the file; this module only parses text it is handed

import { type Result, err, ok } from "@taskguard/shared";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SecurityConfigError } from "./errors.js";
import { SECURITY_PRESETS, SecurityConfig } from "./security-config.js";

// ─── SCHEMA ────────────────────────────────────────────────────

const pathList = z.array(z.string().min(1, "entries must not be empty"));

/**
 * Document shape. `preset` picks the starting point (default: secure); any
 * other field overrides it and turns the result into a custom config.
 */
export const SecurityConfigSchema = z
  .object({
    preset: z.enum(SECURITY_PRESETS).default("secure"),
    enabled: z.boolean().optional(),
    allowedCommands: pathList.optional(),
    restrictedPaths: pathList.optional(),
    blockedPatterns: pathList.optional(),
    maxFileSize: z.number().int().positive().optional(),
    requireConfirmation: z.enum(["none", "destructive", "all"]).optional(),
  })
  .strict();

export type SecurityConfigDocument = z.input<typeof SecurityConfigSchema>;

export type PolicyDocumentFormat = "yaml" | "json";

export interface ParseSecurityConfigOptions {
  /** Environment used for placeholders and the production-hardening rules */
  env?: NodeJS.ProcessEnv;
}

export interface ParseSecurityConfigDocumentOptions extends ParseSecurityConfigOptions {
  /** Expand `${VAR}` and `${VAR:-default}` before parsing (default: true) */
  expandEnvVars?: boolean;
}

// ─── ENVIRONMENT VARIABLE EXPANSION ────────────────────────────

/**
 * Expand environment variables in a string.
 *
 * - `${VAR_NAME}` becomes the value of VAR_NAME, or an empty string
 * - `${VAR_NAME:-default}` becomes the value of VAR_NAME, or "default"
 *
 * @example
 * ```typescript
 * expandEnvVars("maxFileSize: ${MAX_FILE:-1048576}", {}); // "maxFileSize: 1048576"
 * ```
 */
export function expandEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  const pattern = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

  return content.replace(pattern, (_match, varName: string, defaultValue?: string) => {
    const value = env[varName];
    if (value !== undefined) {
      return value;
    }
    return defaultValue ?? "";
  });
}

// ─── PARSING ───────────────────────────────────────────────────

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validate a structured value supplied by the host and build the config it
 * describes. Schema violations, a config failing `validate()` and a config
 * refused under production hardening all come back as errors.
 */
export function parseSecurityConfig(
  input: unknown,
  options: ParseSecurityConfigOptions = {},
): Result<SecurityConfig, SecurityConfigError> {
  const parsed = SecurityConfigSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new SecurityConfigError(
        parsed.error.issues.map(
          (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`,
        ),
        parsed.error,
      ),
    );
  }

  const { preset, ...overrides } = parsed.data;

  let base: SecurityConfig;
  try {
    base = SecurityConfig.fromPreset(preset, options.env);
  } catch (error) {
    if (error instanceof SecurityConfigError) return err(error);
    throw error;
  }

  const hasOverrides = Object.values(overrides).some((value) => value !== undefined);
  const config = hasOverrides ? base.withOverrides(overrides) : base;

  const errors = [...config.validate(), ...config.hardeningIssues(options.env)];
  return errors.length === 0 ? ok(config) : err(new SecurityConfigError(errors));
}

/**
 * Parse YAML or JSON text the host already read. An empty YAML document
 * yields the secure preset.
 */
export function parseSecurityConfigDocument(
  content: string,
  format: PolicyDocumentFormat,
  options: ParseSecurityConfigDocumentOptions = {},
): Result<SecurityConfig, SecurityConfigError> {
  const text = options.expandEnvVars === false ? content : expandEnvVars(content, options.env);

  let value: unknown;
  try {
    value = format === "yaml" ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    return err(
      new SecurityConfigError(
        [`could not parse ${format.toUpperCase()} document: ${describeError(error)}`],
        error instanceof Error ? error : undefined,
      ),
    );
  }

  return parseSecurityConfig(value ?? {}, { env: options.env });
}
