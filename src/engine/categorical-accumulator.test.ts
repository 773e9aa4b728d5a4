import { describe, it, expect } from "vitest";
import { CategoricalAccumulator } from "./categorical-accumulator.js";
import { UsageError } from "../utils/errors.js";

function accumulate(values: Array<string | boolean>) {
  const acc = new CategoricalAccumulator();
  values.forEach(v => acc.update(v));
  return acc;
}

describe("CategoricalAccumulator", () => {
  it("counts frequencies regardless of arrival order", () => {
    const acc = accumulate(["b", "a", "b", "c", "b", "a"]);
    expect(acc.frequencyOf("a")).toBe(2);
    expect(acc.frequencyOf("b")).toBe(3);
    expect(acc.frequencyOf("c")).toBe(1);
    expect(acc.frequencyOf("z")).toBe(0);
    expect(acc.finalize()).toEqual({
      nonMissingCount: 6,
      distinctCount: 3,
      distinctExact: true,
      distinctRatio: 0.5,
      modalValue: "b",
      modalFrequency: 3,
      modalFraction: 0.5,
    });
  });

  it("breaks modal ties in favour of the value seen first", () => {
    expect(accumulate(["x", "y", "y", "x"]).finalize().modalValue).toBe("x");
    // y reaches two first, but x appeared first
    expect(accumulate(["x", "y", "y", "x", "z"]).finalize().modalValue).toBe("x");
    expect(accumulate(["x", "y", "y"]).finalize().modalValue).toBe("y");
  });

  it("keys booleans by their text", () => {
    const summary = accumulate([true, false, true]).finalize();
    expect(summary.modalValue).toBe("true");
    expect(summary.distinctCount).toBe(2);
  });

  it("reports a ratio of 1 for unique identifiers", () => {
    const ids = Array.from({ length: 25 }, (_, i) => `id-${i}`);
    expect(accumulate(ids).finalize().distinctRatio).toBe(1);
  });

  it("finalizes an empty column to zero ratios", () => {
    expect(new CategoricalAccumulator().finalize()).toEqual({
      nonMissingCount: 0,
      distinctCount: 0,
      distinctExact: true,
      distinctRatio: 0,
      modalValue: null,
      modalFrequency: 0,
      modalFraction: 0,
    });
  });

  it("merges a later shard as if the rows had been seen in one pass", () => {
    const values = ["a", "b", "c", "b", "c", "a", "d", "c", "a"];
    const first = accumulate(values.slice(0, 4));
    const second = accumulate(values.slice(4));
    first.merge(second);
    expect(first.finalize()).toEqual(accumulate(values).finalize());
  });

  it("counts numeric values by their canonical text", () => {
    const acc = new CategoricalAccumulator();
    acc.update("x");
    acc.updateNumeric(7n);
    acc.updateNumeric(7n);
    acc.updateNumeric(2.5);
    expect(acc.frequencyOf("7")).toBe(2);
    expect(acc.frequencyOf("2.5")).toBe(1);
    expect(acc.finalize()).toMatchObject({ nonMissingCount: 4, distinctCount: 3, modalValue: "7", modalFrequency: 2 });
  });

  it("stops keying new numbers past the limit but keeps counting them", () => {
    const acc = new CategoricalAccumulator(2);
    acc.update("x");
    [1n, 2n, 3n, 1n, 4n].forEach(v => acc.updateNumeric(v));
    acc.update("y");
    expect(acc.frequencyOf("1")).toBe(2);
    expect(acc.frequencyOf("3")).toBe(0);
    expect(acc.finalize()).toMatchObject({
      nonMissingCount: 7,
      distinctCount: 4,
      distinctExact: false,
      modalValue: "1",
    });
  });

  it("carries unkeyed counts through a merge", () => {
    const first = new CategoricalAccumulator(1);
    [1n, 2n].forEach(v => first.updateNumeric(v));
    const second = new CategoricalAccumulator(1);
    second.update("a");
    first.merge(second);
    expect(first.finalize()).toMatchObject({ nonMissingCount: 3, distinctCount: 2, distinctExact: false });
  });

  it("rejects updates after finalize", () => {
    const acc = accumulate(["a"]);
    acc.finalize();
    expect(() => acc.update("b")).toThrow(UsageError);
    expect(() => acc.finalize()).toThrow(UsageError);
  });
});
