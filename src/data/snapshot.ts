import { Float64, Table, Utf8, tableFromIPC, tableToIPC, vectorFromArray, type Vector } from 'apache-arrow';
import { z } from 'zod';
import type { Dataset, DatasetColumn } from '../types';
import { BadInputError } from '../utils/errors';

/*
 * Snapshot layout: one Arrow IPC file per session. Columns are stored
 * positionally as c0..cN; names and kinds live in the schema metadata so a
 * read restores every column with its original type.
 *   numeric  -> Float64
 *   textual  -> Utf8
 *   temporal -> Float64 (epoch milliseconds)
 *   mixed    -> Utf8 (each cell JSON-encoded)
 */
const METADATA_KEY = 'hypoforge.columns';

const SnapshotMetadataSchema = z.object({
  rowCount: z.number().int().min(0),
  columns: z.array(
    z.object({
      name: z.string(),
      kind: z.enum(['numeric', 'textual', 'temporal', 'mixed']),
    })
  ),
});

type ColumnSpec = z.infer<typeof SnapshotMetadataSchema>['columns'][number];

function toVector(column: DatasetColumn): Vector {
  switch (column.kind) {
    case 'numeric':
      return vectorFromArray(column.values, new Float64());
    case 'textual':
      return vectorFromArray(column.values, new Utf8());
    case 'temporal':
      return vectorFromArray(
        column.values.map((value) => (value === null ? null : value.getTime())),
        new Float64()
      );
    case 'mixed':
      return vectorFromArray(
        column.values.map((value) => (value === null ? null : JSON.stringify(value))),
        new Utf8()
      );
  }
}

function readCells(vector: Vector, rowCount: number): unknown[] {
  const cells: unknown[] = [];
  for (let row = 0; row < rowCount; row += 1) {
    const cell: unknown = vector.get(row);
    cells.push(cell);
  }
  return cells;
}

function parseMixedCell(cell: string): number | string | null {
  const value: unknown = JSON.parse(cell);
  return typeof value === 'number' || typeof value === 'string' ? value : null;
}

function fromVector(spec: ColumnSpec, vector: Vector, rowCount: number): DatasetColumn {
  const cells = readCells(vector, rowCount);
  switch (spec.kind) {
    case 'numeric':
      return { name: spec.name, kind: 'numeric', values: cells.map((cell) => (typeof cell === 'number' ? cell : null)) };
    case 'textual':
      return { name: spec.name, kind: 'textual', values: cells.map((cell) => (typeof cell === 'string' ? cell : null)) };
    case 'temporal':
      return {
        name: spec.name,
        kind: 'temporal',
        values: cells.map((cell) => (typeof cell === 'number' ? new Date(cell) : null)),
      };
    case 'mixed':
      return {
        name: spec.name,
        kind: 'mixed',
        values: cells.map((cell) => (typeof cell === 'string' ? parseMixedCell(cell) : null)),
      };
  }
}

export function encodeSnapshot(dataset: Dataset): Uint8Array {
  const vectors: Record<string, Vector> = {};
  dataset.columns.forEach((column, index) => {
    vectors[`c${index}`] = toVector(column);
  });

  const table = new Table(vectors);
  const metadata = {
    rowCount: dataset.rowCount,
    columns: dataset.columns.map(({ name, kind }) => ({ name, kind })),
  };
  table.schema.metadata.set(METADATA_KEY, JSON.stringify(metadata));
  return tableToIPC(table, 'file');
}

export function decodeSnapshot(bytes: Uint8Array): Dataset {
  const table = tableFromIPC(bytes);
  const raw = table.schema.metadata.get(METADATA_KEY);
  if (raw === undefined) {
    throw new BadInputError('Snapshot has no column metadata');
  }
  const metadata = SnapshotMetadataSchema.parse(JSON.parse(raw));

  return {
    rowCount: metadata.rowCount,
    columns: metadata.columns.map((spec, index) => {
      const vector = table.getChild(`c${index}`);
      if (!vector) {
        throw new BadInputError(`Snapshot is missing column ${spec.name}`);
      }
      return fromVector(spec, vector, metadata.rowCount);
    }),
  };
}
