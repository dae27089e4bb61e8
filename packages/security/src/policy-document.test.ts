import { describe, expect, it } from "vitest";
import { SecurityConfigError } from "./errors.js";
import {
  expandEnvVars,
  parseSecurityConfig,
  parseSecurityConfigDocument,
} from "./policy-document.js";
import { DEFAULT_RESTRICTED_PATHS, SecurityConfig } from "./security-config.js";

describe("expandEnvVars", () => {
  it("should substitute variables and defaults", () => {
    const env = { API_HOST: "api.example.test" };

    expect(expandEnvVars("https://${API_HOST}/v1", env)).toBe("https://api.example.test/v1");
    expect(expandEnvVars("${MISSING:-fallback}", env)).toBe("fallback");
    expect(expandEnvVars("${MISSING}", env)).toBe("");
    expect(expandEnvVars("$API_HOST", env)).toBe("$API_HOST");
  });
});

describe("parseSecurityConfig", () => {
  it("should default to the secure preset", () => {
    const result = parseSecurityConfig({}, { env: {} });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.equals(SecurityConfig.secure())).toBe(true);
    }
  });

  it("should start from the named preset", () => {
    const result = parseSecurityConfig({ preset: "hardened" }, { env: {} });

    expect(result.ok && result.value.equals(SecurityConfig.secure().harden())).toBe(true);
  });

  it("should apply overrides as a custom config", () => {
    const result = parseSecurityConfig(
      { allowedCommands: ["git"], maxFileSize: 1048576, requireConfirmation: "all" },
      { env: {} },
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.preset).toBe("custom");
      expect(result.value.allowedCommands).toEqual(["git"]);
      expect(result.value.maxFileSize).toBe(1048576);
      expect(result.value.requireConfirmation).toBe("all");
      expect(result.value.restrictedPaths).toEqual(DEFAULT_RESTRICTED_PATHS);
    }
  });

  it("should report schema violations with their path", () => {
    const result = parseSecurityConfig({ maxFileSize: -5 }, { env: {} });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SecurityConfigError);
      expect(result.error.issues).toEqual(["maxFileSize: Number must be greater than 0"]);
    }
  });

  it("should reject unknown keys", () => {
    const result = parseSecurityConfig({ sandbox: true }, { env: {} });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual(["(root): Unrecognized key(s) in object: 'sandbox'"]);
    }
  });

  it("should reject configs that fail validation", () => {
    const result = parseSecurityConfig({ enabled: true, allowedCommands: [] }, { env: {} });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual([
        "allowedCommands must not be empty while sandboxing is enabled",
      ]);
    }
  });

  it("should refuse the permissive preset under production hardening", () => {
    const result = parseSecurityConfig(
      { preset: "permissive" },
      { env: { ENFORCE_PRODUCTION_HARDENING: "1" } },
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues[0]).toContain("ENFORCE_PRODUCTION_HARDENING");
    }
  });

  it("should refuse an unprotected custom config under production hardening", () => {
    const result = parseSecurityConfig(
      { enabled: false, restrictedPaths: [], blockedPatterns: [] },
      { env: { ENFORCE_PRODUCTION_HARDENING: "true" } },
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues[0]).toMatch(
        /^restrictedPaths and blockedPatterns must not both be empty/,
      );
    }
  });
});

describe("parseSecurityConfigDocument", () => {
  it("should parse YAML with environment placeholders", () => {
    const yaml = [
      "preset: secure",
      "maxFileSize: ${MAX_FILE_SIZE:-2048}",
      "allowedCommands:",
      "  - git",
      "  - ${EXTRA_COMMAND}",
    ].join("\n");

    const result = parseSecurityConfigDocument(yaml, "yaml", { env: { EXTRA_COMMAND: "npm" } });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.maxFileSize).toBe(2048);
      expect(result.value.allowedCommands).toEqual(["git", "npm"]);
    }
  });

  it("should parse JSON", () => {
    const result = parseSecurityConfigDocument('{"preset":"relaxed"}', "json", { env: {} });
    expect(result.ok && result.value.equals(SecurityConfig.secure().relax())).toBe(true);
  });

  it("should treat an empty YAML document as the secure preset", () => {
    const result = parseSecurityConfigDocument("", "yaml", { env: {} });
    expect(result.ok && result.value.equals(SecurityConfig.secure())).toBe(true);
  });

  it("should return syntax errors as configuration errors", () => {
    const yaml = parseSecurityConfigDocument("allowedCommands: [git", "yaml", { env: {} });
    const json = parseSecurityConfigDocument("{", "json", { env: {} });

    expect(yaml.ok).toBe(false);
    if (!yaml.ok) {
      expect(yaml.error.issues[0]).toMatch(/^could not parse YAML document: /);
    }
    expect(json.ok).toBe(false);
    if (!json.ok) {
      expect(json.error.issues[0]).toMatch(/^could not parse JSON document: /);
    }
  });

  it("should leave placeholders alone when expansion is off", () => {
    const result = parseSecurityConfigDocument("maxFileSize: ${MAX_FILE_SIZE}", "yaml", {
      env: { MAX_FILE_SIZE: "4096" },
      expandEnvVars: false,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual(["maxFileSize: Expected number, received string"]);
    }
  });
});
