import { describe, it, expect } from "vitest";
import { loadConfig, resolveConfig } from "./config.js";
import { DataInspectError } from "./utils/errors.js";

describe("Config", () => {
  describe("resolveConfig", () => {
    it("applies defaults", () => {
      const config = resolveConfig();
      expect(config.reservoirCapacity).toBe(10000);
      expect(config.seed).toBe(42);
      expect(config.missingTokens).toEqual(["", "na", "n/a", "null", "nan", "none"]);
      expect(config.booleanTrue).toEqual(["true", "yes"]);
      expect(config.thresholds).toEqual({
        missingWarning: 0.1,
        missingCritical: 0.5,
        identifierMinCount: 20,
        identifierRatio: 0.95,
        identifierMaxRangeRatio: 1.05,
        nearConstantModalFraction: 0.99,
        nearConstantRelativeSpread: 1e-6,
        mixedCriticalFraction: 0.2,
        outlierRobustZ: 5,
      });
    });

    it("normalises tokens to trimmed lower case", () => {
      expect(resolveConfig({ booleanTrue: [" Y ", "On"] }).booleanTrue).toEqual(["y", "on"]);
    });
  });

  describe("loadConfig", () => {
    it("uses defaults with no DATAINSPECT_ variables", () => {
      expect(loadConfig({})).toEqual(resolveConfig());
    });

    it("reads sizes, token lists and thresholds from the environment", () => {
      const config = loadConfig({
        DATAINSPECT_RESERVOIR_CAPACITY: "500",
        DATAINSPECT_SEED: "7",
        DATAINSPECT_MISSING_TOKENS: ",-,?",
        DATAINSPECT_OUTLIER_Z: "3.5",
        DATAINSPECT_MISSING_WARNING: "0.05",
      });
      expect(config.reservoirCapacity).toBe(500);
      expect(config.seed).toBe(7);
      expect(config.missingTokens).toEqual(["", "-", "?"]);
      expect(config.thresholds.outlierRobustZ).toBe(3.5);
      expect(config.thresholds.missingWarning).toBe(0.05);
      expect(config.thresholds.missingCritical).toBe(0.5);
    });

    it("ignores blank numeric variables", () => {
      expect(loadConfig({ DATAINSPECT_SEED: "  " }).seed).toBe(42);
    });

    it("reports invalid values as a configuration error", () => {
      expect(() => loadConfig({ DATAINSPECT_RESERVOIR_CAPACITY: "lots" })).toThrow(DataInspectError);
      try {
        loadConfig({ DATAINSPECT_RESERVOIR_CAPACITY: "-3" });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DataInspectError);
        if (error instanceof DataInspectError) {
          expect(error.code).toBe("CONFIG");
          expect(error.message).toMatch(/^Configuration error:\n  - reservoirCapacity:/);
          expect(error.getFormattedMessage()).toContain("DATAINSPECT_RESERVOIR_CAPACITY=10000");
        }
      }
    });
  });
});
