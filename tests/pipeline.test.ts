import { describe, expect, it } from "vitest";
import { buildConfig } from "../src/config/options.js";
import { ColumnSpecError, FilterPatternError } from "../src/errors.js";
import { processLines } from "../src/pipeline/index.js";

const people = ["Name Age", "Alice 30", "Bob 25"];
const cells = (lines: string[], options: Record<string, unknown> = {}, columns: string[] = []) =>
  processLines(lines, buildConfig(options, columns)).rows.map((row) => row.cells);

describe("processLines", () => {
  it("should take the first line as header by default", () => {
    const table = processLines(people, buildConfig({}));

    expect(table.headers).toEqual(["Name", "Age"]);
    expect(table.rows.map((row) => row.cells)).toEqual([
      ["Alice", "30"],
      ["Bob", "25"],
    ]);
    expect(table.selectedColumns).toEqual([0, 1]);
  });

  it("should use an explicit header and keep every line as data", () => {
    const table = processLines(people, buildConfig({ headline: false, header: "A B" }));

    expect(table.headers).toEqual(["A", "B"]);
    expect(table.rows.map((row) => row.cells)).toEqual([
      ["Name", "Age"],
      ["Alice", "30"],
      ["Bob", "25"],
    ]);
  });

  it("should fit an explicit header to the selected columns", () => {
    const table = processLines(people, buildConfig({ header: "A B C" }, ["2"]));
    expect(table.headers).toEqual(["A"]);
    expect(table.rows.map((row) => row.cells)).toEqual([["Age"], ["30"], ["25"]]);
  });

  it("should filter before choosing the header", () => {
    const table = processLines(people, buildConfig({ filter: "Alice|Bob" }));

    expect(table.headers).toEqual(["Alice", "30"]);
    expect(table.rows.map((row) => row.cells)).toEqual([["Bob", "25"]]);
  });

  it("should filter, then remove the first survivor, then promote the next", () => {
    const lines = ["# generated", "id name", "1 alpha", "2 beta", "# end"];
    const table = processLines(lines, buildConfig({ filter: "^[^#]", removeHeader: true }));

    expect(table.headers).toEqual(["1", "alpha"]);
    expect(table.rows.map((row) => row.cells)).toEqual([["2", "beta"]]);
  });

  it("should remove the first line and keep the rest as data without headline", () => {
    expect(cells(people, { removeHeader: true, headline: false })).toEqual([
      ["Alice", "30"],
      ["Bob", "25"],
    ]);
  });

  it("should reorder columns and record their source positions", () => {
    const table = processLines(["a b c", "1 2 3"], buildConfig({}, ["3:1"]));

    expect(table.headers).toEqual(["c", "b", "a"]);
    expect(table.rows[0]?.cells).toEqual(["3", "2", "1"]);
    expect(table.selectedColumns).toEqual([2, 1, 0]);
  });

  it("should pad irregular rows to the widest line", () => {
    expect(cells(["x", "y z w"], { headline: false })).toEqual([
      ["x", "", ""],
      ["y", "z", "w"],
    ]);
  });

  it("should split on a custom separator", () => {
    expect(cells(["a;b", "1;2"], { separator: ";" })).toEqual([["1", "2"]]);
  });

  it("should collapse whitespace runs", () => {
    expect(cells(["Name    Age", "Alice   30"], { multiBlank: true })).toEqual([["Alice", "30"]]);
  });

  it("should sort by an output column before grouping", () => {
    const lines = ["dept name", "Sales Bob", "Eng Carl", "Sales Alice"];
    const table = processLines(lines, buildConfig({ sort: "1", group: "1" }));

    expect(table.rows).toEqual([
      { kind: "data", cells: ["Eng", "Carl"] },
      { kind: "separator", cells: ["", ""] },
      { kind: "data", cells: ["Sales", "Bob"] },
      { kind: "data", cells: ["", "Alice"] },
    ]);
  });

  it("should sort by the output position, not the source position", () => {
    const lines = ["name score", "b 10", "a 2", "c 1"];
    expect(cells(lines, { sort: "1" }, ["2", "1"])).toEqual([
      ["1", "c"],
      ["2", "a"],
      ["10", "b"],
    ]);
  });

  it("should ignore sort and group columns outside the table", () => {
    expect(cells(people, { sort: "7", group: "9" })).toEqual([
      ["Alice", "30"],
      ["Bob", "25"],
    ]);
  });

  it("should return an empty table when nothing survives the filter", () => {
    const table = processLines(people, buildConfig({ filter: "^zzz" }));
    expect(table).toEqual({ headers: [], rows: [], selectedColumns: [] });
  });

  it("should reject invalid column specs even without input", () => {
    expect(() => processLines([], buildConfig({}, ["0"]))).toThrow(ColumnSpecError);
  });

  it("should reject an invalid filter", () => {
    expect(() => processLines(people, buildConfig({ filter: "(" }))).toThrow(FilterPatternError);
  });
});
