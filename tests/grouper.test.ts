import { describe, expect, it } from "vitest";
import { groupRows } from "../src/pipeline/grouper.js";
import { dataRow } from "../src/types/index.js";

const staff = () => [dataRow(["Sales", "Alice"]), dataRow(["Sales", "Bob"]), dataRow(["Eng", "Carl"])];

describe("groupRows", () => {
  it("should blank repeats and separate groups", () => {
    const grouped = groupRows(staff(), 1, 2, false);

    expect(grouped).toEqual([
      { kind: "data", cells: ["Sales", "Alice"] },
      { kind: "data", cells: ["", "Bob"] },
      { kind: "separator", cells: ["", ""] },
      { kind: "data", cells: ["Eng", "Carl"] },
    ]);
  });

  it("should keep repeated values when asked", () => {
    const grouped = groupRows(staff(), 1, 2, true);

    expect(grouped.map((row) => row.cells)).toEqual([
      ["Sales", "Alice"],
      ["Sales", "Bob"],
      ["", ""],
      ["Eng", "Carl"],
    ]);
  });

  it("should compare against the value before blanking", () => {
    const rows = [dataRow(["A"]), dataRow(["A"]), dataRow(["A"]), dataRow(["B"])];
    const grouped = groupRows(rows, 1, 1, false);

    expect(grouped.map((row) => row.cells[0])).toEqual(["A", "", "", "", "B"]);
    expect(grouped.map((row) => row.kind)).toEqual(["data", "data", "data", "separator", "data"]);
  });

  it("should not modify the input rows", () => {
    const rows = staff();
    groupRows(rows, 1, 2, false);
    expect(rows[1]?.cells).toEqual(["Sales", "Bob"]);
  });

  it("should ignore a column outside the table", () => {
    const grouped = groupRows(staff(), 5, 2, false);
    expect(grouped).toEqual(staff());
  });
});
