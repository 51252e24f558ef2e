import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, ConfigError } from "@outcome-kit/core";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("should provide a value for every key", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.get("diagnostics.level")).toBe("warn");
      expect(config.get("generation.weights")).toBe("strict");
      expect(config.get("testing.seed")).toBe(42);
      expect(config.get("testing.iterations")).toBe(100);
    });

    it("should expose the merged tree through getAll", () => {
      expect(config.getAll()).toEqual({
        debug: false,
        diagnostics: { level: "warn" },
        generation: { weights: "strict" },
        testing: { seed: 42, iterations: 100 },
      });
    });
  });

  describe("environment", () => {
    it("should parse values by the type of the key's default", () => {
      vi.stubEnv("OUTCOME_KIT_DEBUG", "1");
      vi.stubEnv("OUTCOME_KIT_TESTING_SEED", "7");
      vi.stubEnv("OUTCOME_KIT_GENERATION_WEIGHTS", "permissive");

      expect(config.get("debug")).toBe(true);
      expect(config.get("testing.seed")).toBe(7);
      expect(config.get("generation.weights")).toBe("permissive");
    });

    it("should accept negative integer seeds", () => {
      vi.stubEnv("OUTCOME_KIT_TESTING_SEED", "-3");
      expect(config.get("testing.seed")).toBe(-3);
    });

    it("should reject values that do not fit the key", () => {
      vi.stubEnv("OUTCOME_KIT_DIAGNOSTICS_LEVEL", "loud");
      expect(() => config.get("diagnostics.level")).toThrow(ConfigError);
      expect(() => config.get("diagnostics.level")).toThrow(
        'Invalid configuration value for "diagnostics.level": "loud"',
      );
    });
  });

  describe("set", () => {
    it("should override environment values", () => {
      vi.stubEnv("OUTCOME_KIT_TESTING_ITERATIONS", "5");
      config.set({ testing: { iterations: 9 } });
      expect(config.get("testing.iterations")).toBe(9);
    });

    it("should merge nested objects instead of replacing them", () => {
      config.set({ testing: { seed: 1 } });
      expect(config.get("testing.seed")).toBe(1);
      expect(config.get("testing.iterations")).toBe(100);
    });

    it("should be undone by reset", () => {
      config.set({ generation: { weights: "permissive" } });
      config.reset();
      expect(config.get("generation.weights")).toBe("strict");
    });

    it("should reject a non-positive iteration count on read", () => {
      config.set({ testing: { iterations: 0 } });
      expect(() => config.get("testing.iterations")).toThrow(ConfigError);
    });
  });

  describe("has", () => {
    it("should report whether a path holds a value", () => {
      expect(config.has("testing.seed")).toBe(true);
      expect(config.has("testing.unknown")).toBe(false);
    });
  });
});
