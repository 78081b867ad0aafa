import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import Database from "better-sqlite3";
import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";

export const SALES_CSV = [
  "region,units,price,ordered_at",
  "north,10,2.5,2024-01-01",
  "south,4,3,2024-01-03",
  "north,7,2.5,2024-01-02",
  "east,,4,2024-01-05",
  "north,3,1.5,2024-01-04",
].join("\n");

export const SALES_DESCRIPTION = [
  "The dataset df has 5 rows and 4 columns:",
  "- region: string. 3 unique values. E.g. north (3), south (1), east (1)",
  "- units: numeric. mean: 6.00 min: 3.00 max: 10.00",
  "- price: numeric. mean: 2.70 min: 1.50 max: 4.00",
  "- ordered_at: date. min: 2024-01-01T00:00:00.000Z max: 2024-01-05T00:00:00.000Z",
].join("\n");

export function createTempWorkspace(): string {
  return mkdtempSync(join(tmpdir(), "hypoforge-test-"));
}

export function writeSalesCsv(dir: string, name = "sales.csv"): string {
  const path = join(dir, name);
  writeFileSync(path, SALES_CSV);
  return path;
}

/**
 * Two tables; `orders` is created first, so it comes first in the catalog.
 */
export function createSalesDatabase(dir: string, name = "sales.db"): string {
  const path = join(dir, name);
  const db = new Database(path);
  db.exec(`
    CREATE TABLE orders (region TEXT, units INTEGER, placed_at TEXT);
    CREATE TABLE customers (name TEXT, tier TEXT);
    INSERT INTO orders VALUES ('north', 10, '2024-01-01'), ('south', 4, '2024-01-03'), ('north', NULL, '2024-01-02');
    INSERT INTO customers VALUES ('Ada', 'gold');
  `);
  db.close();
  return path;
}

export interface FakeResponse {
  status: number;
  data: unknown;
}

export interface FakeHttp {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * Axios instance whose adapter answers in process instead of over the network.
 */
export function fakeHttp(respond: (config: InternalAxiosRequestConfig) => FakeResponse): FakeHttp {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = respond(config);
      return { data, status, statusText: String(status), headers: {}, config, request: {} };
    },
  });
  return { http, requests };
}

export function requestBody(config: InternalAxiosRequestConfig): Record<string, unknown> {
  const body: unknown = JSON.parse(String(config.data));
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new Error("Request body is not a JSON object");
  }
  return Object.fromEntries(Object.entries(body));
}

export function systemPromptOf(config: InternalAxiosRequestConfig): string {
  const messages = requestBody(config).messages;
  if (!Array.isArray(messages)) {
    return "";
  }
  const first: unknown = messages[0];
  if (typeof first === "object" && first !== null && "content" in first && typeof first.content === "string") {
    return first.content;
  }
  return "";
}

export function userPromptOf(config: InternalAxiosRequestConfig): string {
  const messages = requestBody(config).messages;
  if (!Array.isArray(messages)) {
    return "";
  }
  const second: unknown = messages[1];
  if (typeof second === "object" && second !== null && "content" in second && typeof second.content === "string") {
    return second.content;
  }
  return "";
}

/**
 * Server-sent event stream carrying each piece as one completion delta.
 */
export function sseStream(pieces: string[]): Readable {
  const frames = pieces.map(
    (content) => `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`
  );
  frames.push("data: [DONE]\n\n");
  return Readable.from(frames.map((frame) => Buffer.from(frame)));
}

export function completionBody(content: string): unknown {
  return { choices: [{ message: { role: "assistant", content } }] };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
