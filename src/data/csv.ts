import * as Papa from 'papaparse';

import type { Dataset } from '../types';
import { BadInputError } from '../utils/errors';
import { buildColumn, coerceTextCells, isMissingToken } from './columns';

export interface RawTable {
  headers: string[];
  rows: (string | null)[][];
}

const detectDelimiter = (headerLine: string): string => {
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ';' : ',';
};

const tokenize = (source: string, delimiter: string): string[][] => {
  const result = Papa.parse<string[]>(source, { delimiter, skipEmptyLines: false });
  const [error] = result.errors;
  if (error) {
    throw new BadInputError(`Error parsing file: ${error.message}`);
  }
  return result.data.filter((candidate) => !(candidate.length === 1 && candidate[0].trim() === ''));
};

const buildHeaders = (rawHeaders: string[]): string[] => {
  const taken = new Set<string>();
  return rawHeaders.map((header, index) => {
    const base = header.trim() || `Unnamed: ${index}`;
    let name = base;
    let suffix = 0;
    while (taken.has(name)) {
      suffix += 1;
      name = `${base}.${suffix}`;
    }
    taken.add(name);
    return name;
  });
};

export const parseCsvText = (text: string): RawTable => {
  const source = text.replace(/^\uFEFF/, '');
  const firstLine = source.split(/\r?\n/, 1)[0] ?? '';
  const records = tokenize(source, detectDelimiter(firstLine));
  if (records.length === 0) {
    throw new BadInputError('The file is empty or contains no valid data');
  }

  const headers = buildHeaders(records[0]);
  const rows = records.slice(1).map((record, index) => {
    if (record.length > headers.length) {
      throw new BadInputError(
        `Error parsing file: expected ${headers.length} fields in data row ${index + 1}, saw ${record.length}`
      );
    }
    return headers.map((_, column) => {
      const cell = record[column];
      return cell === undefined || isMissingToken(cell) ? null : cell;
    });
  });

  return { headers, rows };
};

export const csvToDataset = (text: string): Dataset => {
  const table = parseCsvText(text);
  return {
    rowCount: table.rows.length,
    columns: table.headers.map((name, column) =>
      buildColumn(name, coerceTextCells(table.rows.map((row) => row[column])))
    ),
  };
};
