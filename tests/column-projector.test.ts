import { describe, expect, it } from "vitest";
import { ColumnSpecError } from "../src/errors.js";
import { defaultColumns, fitHeader, parseColumnSpecs, projectTable } from "../src/pipeline/column-projector.js";

describe("parseColumnSpecs", () => {
  it("should convert single columns to zero-based indices", () => {
    expect(parseColumnSpecs(["1", "3"])).toEqual([0, 2]);
  });

  it("should expand ascending and reversed ranges", () => {
    expect(parseColumnSpecs(["2:4"])).toEqual([1, 2, 3]);
    expect(parseColumnSpecs(["3:1"])).toEqual([2, 1, 0]);
    expect(parseColumnSpecs(["2:2"])).toEqual([1]);
  });

  it("should concatenate specs and allow repeats", () => {
    expect(parseColumnSpecs(["2", "1:2", "2"])).toEqual([1, 0, 1, 1]);
  });

  it("should return nothing for no specs", () => {
    expect(parseColumnSpecs([])).toEqual([]);
  });

  it("should reject zero", () => {
    expect(() => parseColumnSpecs(["0"])).toThrow("Invalid column spec '0': column numbers are 1-based");
    expect(() => parseColumnSpecs(["1:0"])).toThrow(ColumnSpecError);
    expect(() => parseColumnSpecs(["0:2"])).toThrow(ColumnSpecError);
  });

  it("should reject malformed specs", () => {
    expect(() => parseColumnSpecs(["a"])).toThrow("Invalid column spec 'a': column 'a' is not a number");
    expect(() => parseColumnSpecs([":3"])).toThrow("Invalid column spec ':3': range start '' is not a number");
    expect(() => parseColumnSpecs(["1:x"])).toThrow("Invalid column spec '1:x': range end 'x' is not a number");
    expect(() => parseColumnSpecs(["1:2:3"])).toThrow("Invalid column spec '1:2:3': expected a range like START:END");
    expect(() => parseColumnSpecs(["-1"])).toThrow(ColumnSpecError);
  });
});

describe("projectTable", () => {
  it("should reverse a row with a reversed range", () => {
    const table = projectTable([], [["a", "b", "c"]], parseColumnSpecs(["3:1"]));
    expect(table.rows[0]?.cells).toEqual(["c", "b", "a"]);
    expect(table.selectedColumns).toEqual([2, 1, 0]);
  });

  it("should fill missing source fields with empty strings", () => {
    const rows = [["x"], ["y", "z", "w"]];
    const selected = defaultColumns([], rows);
    const table = projectTable([], rows, selected);

    expect(selected).toEqual([0, 1, 2]);
    expect(table.rows.map((row) => row.cells)).toEqual([
      ["x", "", ""],
      ["y", "z", "w"],
    ]);
    for (const row of table.rows) {
      expect(row.cells).toHaveLength(table.selectedColumns.length);
    }
  });

  it("should size the default selection by the header when it is wider", () => {
    expect(defaultColumns(["a", "b", "c"], [["1"]])).toEqual([0, 1, 2]);
  });

  it("should project the header through the selection", () => {
    const table = projectTable(["Name", "Age", "City"], [["Alice", "30", "Paris"]], [2, 0, 5]);
    expect(table.headers).toEqual(["City", "Name", ""]);
    expect(table.rows[0]?.cells).toEqual(["Paris", "Alice", ""]);
  });

  it("should keep an empty header empty", () => {
    expect(projectTable([], [["a"]], [0, 1]).headers).toEqual([]);
  });

  it("should fit an explicit header to the output width", () => {
    const table = projectTable([], [["a", "b"]], [1], ["First", "Second"]);
    expect(table.headers).toEqual(["First"]);
    expect(fitHeader(["A"], 3)).toEqual(["A", "", ""]);
  });

  it("should mark every projected row as data", () => {
    const table = projectTable([], [["a"], ["b"]], [0]);
    expect(table.rows.every((row) => row.kind === "data")).toBe(true);
  });
});
