import { describe, expect, it } from "vitest";
import {
  KernelConfigError,
  KernelSettingsSchema,
  assertProductionHardening,
  getProductionHardeningIssues,
  isPermissivePolicyAllowed,
  isProductionHardeningEnabled,
  loadKernelSettings,
} from "../config.js";

describe("KernelSettingsSchema", () => {
  it("should parse empty settings with defaults", () => {
    const result = KernelSettingsSchema.parse({});

    expect(result.logging.level).toBe("info");
    expect(result.engine.eventLogLimit).toBe(1000);
    expect(result.engine.enforceProductionHardening).toBe(false);
    expect(result.engine.allowPermissivePolicy).toBe(false);
  });

  it("should reject invalid log levels", () => {
    expect(() => {
      KernelSettingsSchema.parse({ logging: { level: "loud" } });
    }).toThrow();
  });

  it("should reject a zero event log limit", () => {
    expect(() => {
      KernelSettingsSchema.parse({ engine: { eventLogLimit: 0 } });
    }).toThrow();
  });
});

describe("loadKernelSettings", () => {
  it("should read values from environment variables", () => {
    const settings = loadKernelSettings({
      LOG_LEVEL: "warn",
      LOG_PRETTY: "false",
      LOG_FILE: "/var/log/taskguard.log",
      TASKGUARD_EVENT_LOG_LIMIT: "250",
      ENFORCE_PRODUCTION_HARDENING: "1",
      ALLOW_PERMISSIVE_POLICY: "yes",
    });

    expect(settings.logging).toEqual({
      level: "warn",
      pretty: false,
      file: "/var/log/taskguard.log",
    });
    expect(settings.engine).toEqual({
      eventLogLimit: 250,
      enforceProductionHardening: true,
      allowPermissivePolicy: true,
    });
  });

  it("should ignore blank environment values", () => {
    const settings = loadKernelSettings({ LOG_LEVEL: "  ", TASKGUARD_EVENT_LOG_LIMIT: "" });

    expect(settings.logging.level).toBe("info");
    expect(settings.engine.eventLogLimit).toBe(1000);
  });

  it("should apply overrides after environment values", () => {
    const settings = loadKernelSettings(
      { TASKGUARD_EVENT_LOG_LIMIT: "250" },
      { engine: { eventLogLimit: 10 } },
    );

    expect(settings.engine.eventLogLimit).toBe(10);
  });

  it("should throw KernelConfigError listing each invalid value", () => {
    let caught: unknown;
    try {
      loadKernelSettings({ TASKGUARD_EVENT_LOG_LIMIT: "lots", LOG_PRETTY: "maybe" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(KernelConfigError);
    if (caught instanceof KernelConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues.some((issue) => issue.startsWith("logging.pretty:"))).toBe(true);
      expect(caught.issues.some((issue) => issue.startsWith("engine.eventLogLimit:"))).toBe(true);
      expect(caught.message.startsWith("Invalid taskguard settings:")).toBe(true);
    }
  });
});

describe("production hardening", () => {
  it("should detect the hardening flag", () => {
    expect(isProductionHardeningEnabled({})).toBe(false);
    expect(isProductionHardeningEnabled({ ENFORCE_PRODUCTION_HARDENING: "true" })).toBe(true);
    expect(isProductionHardeningEnabled({ ENFORCE_PRODUCTION_HARDENING: " ON " })).toBe(true);
    expect(isProductionHardeningEnabled({ ENFORCE_PRODUCTION_HARDENING: "false" })).toBe(false);
  });

  it("should detect the permissive opt-in", () => {
    expect(isPermissivePolicyAllowed({})).toBe(false);
    expect(isPermissivePolicyAllowed({ ALLOW_PERMISSIVE_POLICY: "true" })).toBe(true);
  });

  it("should report noisy log levels and small event logs", () => {
    const settings = loadKernelSettings({ LOG_LEVEL: "debug", TASKGUARD_EVENT_LOG_LIMIT: "10" });

    expect(getProductionHardeningIssues(settings)).toEqual([
      'LOG_LEVEL must not be "debug" or "trace" in production.',
      "TASKGUARD_EVENT_LOG_LIMIT must keep at least 100 events in production.",
    ]);
    expect(() => assertProductionHardening(settings)).toThrow(
      "Production hardening checks failed:",
    );
  });

  it("should pass hardened defaults", () => {
    const settings = loadKernelSettings({ LOG_LEVEL: "info" });
    expect(getProductionHardeningIssues(settings)).toEqual([]);
    expect(() => assertProductionHardening(settings)).not.toThrow();
  });
});
