import { describe, it, expect } from "vitest";

import { csvToDataset, parseCsvText } from "../src/data/csv";
import { BadInputError } from "../src/utils/errors";

describe("parseCsvText", () => {
  it("reads quoted fields with delimiters, escaped quotes and newlines", () => {
    const table = parseCsvText('name,note\n"Smith, J","said ""hi""\nthen left"\nLee,plain\n');

    expect(table.headers).toEqual(["name", "note"]);
    expect(table.rows).toEqual([
      ["Smith, J", 'said "hi"\nthen left'],
      ["Lee", "plain"],
    ]);
  });

  it("strips a byte order mark and detects a semicolon delimiter with CRLF lines", () => {
    const table = parseCsvText("\uFEFFa;b\r\n1;2\r\n3;4\r\n");

    expect(table.headers).toEqual(["a", "b"]);
    expect(table.rows).toEqual([
      ["1", "2"],
      ["3", "4"],
    ]);
  });

  it("names blank headers and numbers duplicates", () => {
    const table = parseCsvText(",x,x\n1,2,3");

    expect(table.headers).toEqual(["Unnamed: 0", "x", "x.1"]);
  });

  it("pads short rows and reads NA tokens as missing", () => {
    const table = parseCsvText("a,b\n1\nNA,2\n\n");

    expect(table.rows).toEqual([
      ["1", null],
      [null, "2"],
    ]);
  });

  it("rejects a row with more fields than the header", () => {
    expect(() => parseCsvText("a,b\n1,2,3")).toThrow(
      new BadInputError("Error parsing file: expected 2 fields in data row 1, saw 3")
    );
  });

  it("rejects empty input", () => {
    expect(() => parseCsvText("")).toThrow("The file is empty or contains no valid data");
    expect(() => parseCsvText("\n\n")).toThrow(BadInputError);
  });

  it("rejects an unterminated quoted field", () => {
    expect(() => parseCsvText('a\n"open')).toThrow("Error parsing file: Quoted field unterminated");
  });
});

describe("csvToDataset", () => {
  it("classifies numeric, textual and temporal columns", () => {
    const dataset = csvToDataset("id,label,day\n1,x,2024-02-01\n2,1,2024-02-02T10:30:00\n");

    expect(dataset.rowCount).toBe(2);
    expect(dataset.columns.map(({ name, kind }) => ({ name, kind }))).toEqual([
      { name: "id", kind: "numeric" },
      { name: "label", kind: "textual" },
      { name: "day", kind: "temporal" },
    ]);
    expect(dataset.columns[0].values).toEqual([1, 2]);
    expect(dataset.columns[1].values).toEqual(["x", "1"]);
    expect(dataset.columns[2].values).toEqual([
      new Date("2024-02-01T00:00:00.000Z"),
      new Date("2024-02-02T10:30:00.000Z"),
    ]);
  });

  it("treats an all-missing column as numeric", () => {
    const dataset = csvToDataset("a,b\n1,\n2,NA\n");

    expect(dataset.columns[1]).toEqual({ name: "b", kind: "numeric", values: [null, null] });
  });
});
