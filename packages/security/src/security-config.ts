// Security configuration — process-wide command and path policy
// Immutable value type; presets form a closed set of variants

import { basename, isAbsolute } from "node:path";
import {
  createLogger,
  isPermissivePolicyAllowed,
  isProductionHardeningEnabled,
} from "@taskguard/kernel";
import { sameMembers, uniqueList } from "@taskguard/shared";
import { SecurityConfigError } from "./errors.js";
import {
  expandHome,
  isWithinDirectory,
  toAbsolutePath,
  tryCanonicalizePath,
} from "./path-utils.js";
import type { TaskFileScope } from "./task-file-scope.js";
import { type ConfirmationLevel, requiresConfirmation } from "./types.js";

const log = createLogger({ name: "security-config" });

// ─── DEFAULTS ──────────────────────────────────────────────────

const MiB = 1024 * 1024;

export const DEFAULT_MAX_FILE_SIZE = 10 * MiB;
export const HARDENED_MAX_FILE_SIZE = 5 * MiB;
export const RELAXED_MAX_FILE_SIZE = 50 * MiB;

/** Build and toolchain commands a coding task normally needs */
export const DEFAULT_ALLOWED_COMMANDS: readonly string[] = Object.freeze([
  "git",
  "dotnet",
  "npm",
  "npx",
  "yarn",
  "pnpm",
  "gradle",
  "gradlew",
  "mvn",
  "cargo",
  "rustc",
  "python",
  "python3",
  "pip",
  "pip3",
  "node",
  "deno",
  "bun",
  "go",
  "make",
  "cmake",
]);

/** Literal fragments refused anywhere in a command line */
export const DEFAULT_BLOCKED_PATTERNS: readonly string[] = Object.freeze([
  "rm -rf --no-preserve-root",
  ":(){:|:&};:",
  ":(){ :|:& };:",
  "mkfs.",
  "dd if=/dev/zero",
  "chmod -R 777 /",
  "shred /dev/",
]);

export const DEFAULT_RESTRICTED_PATHS: readonly string[] = Object.freeze([
  "/etc",
  "/usr",
  "/bin",
  "/sbin",
  "/var",
  "/System",
  "/Library",
]);

/** Added to the restricted paths by {@link SecurityConfig.harden} */
export const HARDENED_RESTRICTED_PATHS: readonly string[] = Object.freeze([
  "/System",
  "/Library",
  "/private",
]);

// ─── TYPES ─────────────────────────────────────────────────────

export const SECURITY_PRESETS = ["secure", "hardened", "relaxed", "permissive", "custom"] as const;
export type SecurityPreset = (typeof SECURITY_PRESETS)[number];

/** Plain-data form of a {@link SecurityConfig} */
export interface SecurityConfigData {
  preset: SecurityPreset;
  /** Command sandboxing: when off every executable is allowed */
  enabled: boolean;
  allowedCommands: readonly string[];
  restrictedPaths: readonly string[];
  blockedPatterns: readonly string[];
  /** Bytes */
  maxFileSize: number;
  requireConfirmation: ConfirmationLevel;
}

export type SecurityConfigOverrides = Partial<Omit<SecurityConfigData, "preset">>;

export interface RestrictedPathOptions {
  /** Also check the symlink-resolved form of the path (default: true) */
  followSymlinks?: boolean;
}

const SECURE_DEFAULTS: Omit<SecurityConfigData, "preset"> = {
  enabled: true,
  allowedCommands: DEFAULT_ALLOWED_COMMANDS,
  restrictedPaths: DEFAULT_RESTRICTED_PATHS,
  blockedPatterns: DEFAULT_BLOCKED_PATTERNS,
  maxFileSize: DEFAULT_MAX_FILE_SIZE,
  requireConfirmation: "destructive",
};

/** Fields left undefined keep their base value; the result is tagged custom. */
function applyOverrides(
  base: SecurityConfigData,
  overrides: SecurityConfigOverrides,
): SecurityConfigData {
  return {
    preset: "custom",
    enabled: overrides.enabled ?? base.enabled,
    allowedCommands: overrides.allowedCommands ?? base.allowedCommands,
    restrictedPaths: overrides.restrictedPaths ?? base.restrictedPaths,
    blockedPatterns: overrides.blockedPatterns ?? base.blockedPatterns,
    maxFileSize: overrides.maxFileSize ?? base.maxFileSize,
    requireConfirmation: overrides.requireConfirmation ?? base.requireConfirmation,
  };
}

// ─── COMMAND PARSING ───────────────────────────────────────────

const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/**
 * Executable name of a command line: the basename of its first token, with
 * quotes and leading `VAR=value` assignments stripped.
 *
 * @example
 * ```typescript
 * extractExecutable("CI=1 /usr/bin/git status"); // "git"
 * extractExecutable("'npm' install");             // "npm"
 * ```
 */
export function extractExecutable(commandLine: string): string | undefined {
  const tokens = commandLine.trim().split(/\s+/);
  const first = tokens.find((token) => token !== "" && !ENV_ASSIGNMENT.test(token));
  if (first === undefined) return undefined;

  const unquoted = first.replace(/^["']+|["']+$/g, "");
  if (unquoted === "") return undefined;
  return basename(unquoted);
}

// ─── SECURITY CONFIG ───────────────────────────────────────────

/**
 * Process-wide security policy. Instances are frozen; {@link harden},
 * {@link relax} and the other transforms return new instances.
 */
export class SecurityConfig implements SecurityConfigData {
  readonly preset: SecurityPreset;
  readonly enabled: boolean;
  readonly allowedCommands: readonly string[];
  readonly restrictedPaths: readonly string[];
  readonly blockedPatterns: readonly string[];
  readonly maxFileSize: number;
  readonly requireConfirmation: ConfirmationLevel;

  private constructor(data: SecurityConfigData) {
    this.preset = data.preset;
    this.enabled = data.enabled;
    this.allowedCommands = Object.freeze(uniqueList(data.allowedCommands));
    this.restrictedPaths = Object.freeze(uniqueList(data.restrictedPaths));
    this.blockedPatterns = Object.freeze(uniqueList(data.blockedPatterns));
    this.maxFileSize = data.maxFileSize;
    this.requireConfirmation = data.requireConfirmation;
    Object.freeze(this);
  }

  // ─── PRESETS ───

  /** Sandboxing on, system paths restricted, destructive idioms blocked. */
  static secure(): SecurityConfig {
    return new SecurityConfig({ preset: "secure", ...SECURE_DEFAULTS });
  }

  /**
   * All protections off, for trusted contexts only.
   *
   * @throws SecurityConfigError when ENFORCE_PRODUCTION_HARDENING is on and
   *   ALLOW_PERMISSIVE_POLICY is not
   */
  static permissive(env: NodeJS.ProcessEnv = process.env): SecurityConfig {
    if (isProductionHardeningEnabled(env)) {
      if (!isPermissivePolicyAllowed(env)) {
        throw new SecurityConfigError([
          "the permissive preset is refused while ENFORCE_PRODUCTION_HARDENING is on (set ALLOW_PERMISSIVE_POLICY=true to opt in)",
        ]);
      }
      log.warn("Permissive security preset loaded under production hardening", {
        preset: "permissive",
      });
    }

    return new SecurityConfig({
      preset: "permissive",
      enabled: false,
      allowedCommands: DEFAULT_ALLOWED_COMMANDS,
      restrictedPaths: [],
      blockedPatterns: [],
      maxFileSize: DEFAULT_MAX_FILE_SIZE,
      requireConfirmation: "none",
    });
  }

  /** A named preset; `custom` is the secure defaults tagged as custom. */
  static fromPreset(preset: SecurityPreset, env: NodeJS.ProcessEnv = process.env): SecurityConfig {
    switch (preset) {
      case "secure":
        return SecurityConfig.secure();
      case "hardened":
        return SecurityConfig.secure().harden();
      case "relaxed":
        return SecurityConfig.secure().relax();
      case "permissive":
        return SecurityConfig.permissive(env);
      case "custom":
        return SecurityConfig.create();
    }
  }

  /** Secure defaults with the given fields replaced. */
  static create(overrides: SecurityConfigOverrides = {}): SecurityConfig {
    return new SecurityConfig(applyOverrides({ preset: "custom", ...SECURE_DEFAULTS }, overrides));
  }

  // ─── QUERIES ───

  /** True when sandboxing is off or the command's executable is allow-listed. */
  isCommandAllowed(commandLine: string): boolean {
    if (!this.enabled) return true;
    const executable = extractExecutable(commandLine);
    return executable !== undefined && this.allowedCommands.includes(executable);
  }

  /**
   * The restricted-path entry that `path` is equal to or below, checking the
   * lexical absolute form and, unless disabled, the symlink-resolved form.
   */
  findRestrictedPath(path: string, options: RestrictedPathOptions = {}): string | undefined {
    const lexical = toAbsolutePath(path);
    const canonical = options.followSymlinks === false ? undefined : tryCanonicalizePath(path);

    return this.restrictedPaths.find((entry) => {
      const restricted = toAbsolutePath(entry);
      if (isWithinDirectory(lexical, restricted)) return true;
      if (canonical === undefined) return false;
      if (isWithinDirectory(canonical, restricted)) return true;
      const canonicalEntry = tryCanonicalizePath(entry);
      return canonicalEntry !== undefined && isWithinDirectory(canonical, canonicalEntry);
    });
  }

  /** Restricted when under a restricted entry; an unresolvable path counts as restricted. */
  isPathRestricted(path: string): boolean {
    if (this.restrictedPaths.length === 0) return false;
    if (tryCanonicalizePath(path) === undefined) return true;
    return this.findRestrictedPath(path) !== undefined;
  }

  /** First blocked fragment contained in `text`. */
  findBlockedPattern(text: string): string | undefined {
    return this.blockedPatterns.find((pattern) => pattern !== "" && text.includes(pattern));
  }

  requiresConfirmation(isDestructive: boolean): boolean {
    return requiresConfirmation(this.requireConfirmation, isDestructive);
  }

  // ─── TRANSFORMS ───

  /**
   * Stricter copy: sandboxing on, confirmation for everything, smaller file
   * limit and extra restricted paths. Permits a subset of this config.
   */
  harden(): SecurityConfig {
    return new SecurityConfig({
      ...this.toJSON(),
      preset: "hardened",
      enabled: true,
      // A disabled sandbox allowed every command, so any allow-list narrows it
      allowedCommands:
        !this.enabled && this.allowedCommands.length === 0
          ? DEFAULT_ALLOWED_COMMANDS
          : this.allowedCommands,
      restrictedPaths: [...this.restrictedPaths, ...HARDENED_RESTRICTED_PATHS],
      maxFileSize: Math.min(this.maxFileSize, HARDENED_MAX_FILE_SIZE),
      requireConfirmation: "all",
    });
  }

  /** Looser copy for trusted environments. Restricted paths and blocked patterns are kept. */
  relax(): SecurityConfig {
    return new SecurityConfig({
      ...this.toJSON(),
      preset: "relaxed",
      enabled: false,
      maxFileSize: Math.max(this.maxFileSize, RELAXED_MAX_FILE_SIZE),
      requireConfirmation:
        this.requireConfirmation === "all" ? "destructive" : this.requireConfirmation,
    });
  }

  /** Adds the scope's home-directory credential stores to the restricted paths. */
  withTaskScope(scope: TaskFileScope, home?: string): SecurityConfig {
    return new SecurityConfig({
      ...this.toJSON(),
      preset: "custom",
      restrictedPaths: [...this.restrictedPaths, ...scope.effectiveRestrictedPaths(home)],
    });
  }

  withOverrides(overrides: SecurityConfigOverrides): SecurityConfig {
    return new SecurityConfig(applyOverrides(this.toJSON(), overrides));
  }

  // ─── VALIDATION ───

  /** Configuration errors; empty when the config may be applied. */
  validate(): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(this.maxFileSize) || this.maxFileSize <= 0) {
      errors.push(`maxFileSize must be a positive integer (got ${this.maxFileSize})`);
    }
    if (this.enabled && this.allowedCommands.length === 0) {
      errors.push("allowedCommands must not be empty while sandboxing is enabled");
    }
    for (const entry of this.restrictedPaths) {
      if (!isAbsolute(expandHome(entry))) {
        errors.push(`restrictedPaths entry must be an absolute path: ${entry}`);
      }
    }

    return errors;
  }

  /**
   * Reasons this config may not be applied under ENFORCE_PRODUCTION_HARDENING.
   * Emptying both the restricted paths and the blocked patterns is the
   * permissive preset under another name, and needs the same opt-in.
   */
  hardeningIssues(env: NodeJS.ProcessEnv = process.env): string[] {
    if (!isProductionHardeningEnabled(env) || isPermissivePolicyAllowed(env)) return [];
    if (this.restrictedPaths.length > 0 || this.blockedPatterns.length > 0) return [];
    return [
      "restrictedPaths and blockedPatterns must not both be empty while ENFORCE_PRODUCTION_HARDENING is on (set ALLOW_PERMISSIVE_POLICY=true to opt in)",
    ];
  }

  equals(other: SecurityConfig): boolean {
    return (
      this.preset === other.preset &&
      this.enabled === other.enabled &&
      this.maxFileSize === other.maxFileSize &&
      this.requireConfirmation === other.requireConfirmation &&
      sameMembers(this.allowedCommands, other.allowedCommands) &&
      sameMembers(this.restrictedPaths, other.restrictedPaths) &&
      sameMembers(this.blockedPatterns, other.blockedPatterns)
    );
  }

  toJSON(): SecurityConfigData {
    return {
      preset: this.preset,
      enabled: this.enabled,
      allowedCommands: [...this.allowedCommands],
      restrictedPaths: [...this.restrictedPaths],
      blockedPatterns: [...this.blockedPatterns],
      maxFileSize: this.maxFileSize,
      requireConfirmation: this.requireConfirmation,
    };
  }
}
