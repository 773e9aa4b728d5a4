import { describe, it, expect } from "vitest";
import { ColumnProfile } from "./column.js";
import { classifyField } from "./classify.js";
import { createRandom } from "./reservoir.js";
import { UsageError } from "../utils/errors.js";
import type { ClassifierOptions } from "../types/field.js";

const classifier: ClassifierOptions = {
  missingTokens: ["", "na"],
  booleanTrue: ["true", "yes"],
  booleanFalse: ["false", "no"],
};

function profile(name: string, values: string[]): ColumnProfile {
  const column = new ColumnProfile(name, 0, {
    reservoirCapacity: 100,
    distinctLimit: 100,
    outlierRobustZ: 5,
    random: createRandom(1),
  });
  values.forEach(value => column.update(classifyField(value, classifier)));
  return column;
}

describe("ColumnProfile", () => {
  it("keeps numeric statistics for a numeric column", () => {
    const report = profile("qty", ["3", "na", "5", "7"]).finalize();
    expect(report.kind).toBe("numeric");
    expect(report.inferredType).toBe("numeric");
    expect(report.rowCount).toBe(4);
    expect(report.missingCount).toBe(1);
    if (report.kind === "numeric") {
      expect(report.numeric.mean).toBe(5);
      expect(report.numeric.integerOnly).toBe(true);
      expect(report.numeric.distinctCount).toBe(3);
    }
  });

  it("summarises booleans as categories", () => {
    const report = profile("active", ["yes", "no", "YES"]).finalize();
    expect(report.inferredType).toBe("boolean");
    expect(report.kind).toBe("categorical");
    if (report.kind === "categorical") {
      expect(report.categorical.modalValue).toBe("true");
      expect(report.categorical.modalFrequency).toBe(2);
    }
  });

  it("marks a contaminated numeric column as mixed and keeps numeric accumulation", () => {
    const report = profile("price", ["1.5", "2.5", "n/a?", "3.5"]).finalize();
    expect(report.inferredType).toBe("mixed");
    expect(report.majorityType).toBe("numeric");
    expect(report.nonconformingCount).toBe(1);
    if (report.kind === "numeric") {
      expect(report.numeric.count).toBe(3);
      expect(report.numeric.integerOnly).toBe(false);
    } else {
      expect.unreachable();
    }
  });

  it("combines shards", () => {
    const left = profile("tag", ["a", "b"]);
    left.merge(profile("tag", ["b", "b", "c"]));
    const report = left.finalize();
    expect(report.rowCount).toBe(5);
    if (report.kind === "categorical") {
      expect(report.categorical.distinctCount).toBe(3);
      expect(report.categorical.modalValue).toBe("b");
    } else {
      expect.unreachable();
    }
  });

  it("rejects updates after finalize", () => {
    const column = profile("x", ["1"]);
    column.finalize();
    expect(() => column.update({ tag: "missing" })).toThrow(UsageError);
    expect(() => column.finalize()).toThrow('Column "x" is already finalized');
  });
});
