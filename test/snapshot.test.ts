import { tableFromArrays, tableToIPC } from "apache-arrow";
import { describe, it, expect } from "vitest";

import { decodeSnapshot, encodeSnapshot } from "../src/data/snapshot";
import type { Dataset } from "../src/types";
import { BadInputError } from "../src/utils/errors";

describe("snapshot", () => {
  it("restores every column kind with its values and missing cells", () => {
    const dataset: Dataset = {
      rowCount: 3,
      columns: [
        { name: "units", kind: "numeric", values: [1.5, null, -3] },
        { name: "region", kind: "textual", values: ["north", "south", null] },
        { name: "day", kind: "temporal", values: [new Date("2024-01-01T00:00:00Z"), null, new Date("2024-03-09T12:00:00Z")] },
        { name: "code", kind: "mixed", values: [7, "7", null] },
      ],
    };

    expect(decodeSnapshot(encodeSnapshot(dataset))).toEqual(dataset);
  });

  it("rejects Arrow data without column metadata", () => {
    const bytes = tableToIPC(tableFromArrays({ x: Float64Array.from([1, 2]) }), "file");

    expect(() => decodeSnapshot(bytes)).toThrow(new BadInputError("Snapshot has no column metadata"));
  });
});
