import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { readDelimitedRows } from "./delimited.js";

async function collect(text: string | string[], delimiter = ","): Promise<string[][]> {
  const chunks = Array.isArray(text) ? text : [text];
  const rows: string[][] = [];
  for await (const row of readDelimitedRows(Readable.from(chunks), { delimiter })) {
    rows.push(row);
  }
  return rows;
}

describe("readDelimitedRows", () => {
  it("yields the header and rows as raw strings", async () => {
    expect(await collect("a,b\n1, x \n2,\n")).toEqual([
      ["a", "b"],
      ["1", " x "],
      ["2", ""],
    ]);
  });

  it("handles quoted delimiters, escaped quotes and a byte order mark", async () => {
    expect(await collect('\uFEFFname,note\n"Smith, J","said ""hi"""\n')).toEqual([
      ["name", "note"],
      ["Smith, J", 'said "hi"'],
    ]);
  });

  it("keeps rows with the wrong field count for the engine to judge", async () => {
    expect(await collect("a,b\n1\n1,2,3\n")).toEqual([["a", "b"], ["1"], ["1", "2", "3"]]);
  });

  it("skips blank lines and reads tab-separated input", async () => {
    expect(await collect("a\tb\n\n1\t2\n", "\t")).toEqual([["a", "b"], ["1", "2"]]);
  });

  it("reassembles rows split across chunks", async () => {
    expect(await collect(["a,b\n1", "0,2", "0\n"])).toEqual([["a", "b"], ["10", "20"]]);
  });

  it("surfaces read errors from the input stream", async () => {
    const failing = new Readable({
      read() {
        this.push("a,b\n1,2\n");
        this.destroy(new Error("disk went away"));
      },
    });
    const drain = async () => {
      const rows: string[][] = [];
      for await (const row of readDelimitedRows(failing, { delimiter: "," })) {
        rows.push(row);
      }
      return rows;
    };
    await expect(drain()).rejects.toThrow("disk went away");
  });
});
