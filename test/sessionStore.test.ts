import { existsSync, mkdirSync, rmSync } from "fs";
import { describe, it, expect } from "vitest";

import { csvToDataset } from "../src/data/csv";
import { SessionStore } from "../src/session/sessionStore";
import { NotFoundError } from "../src/utils/errors";
import { SALES_CSV, SALES_DESCRIPTION, createTempWorkspace } from "./helpers";

const dataset = csvToDataset(SALES_CSV);

describe("SessionStore", () => {
  it("creates distinct sessions under concurrent calls", async () => {
    const store = await SessionStore.open(createTempWorkspace());

    const records = await Promise.all(Array.from({ length: 10 }, () => store.create(dataset, "sales.csv")));

    expect(new Set(records.map((record) => record.sessionId)).size).toBe(10);
    expect(store.size).toBe(10);
    expect(records.every((record) => existsSync(record.snapshotPath))).toBe(true);
  });

  it("records metadata and restores the dataset", async () => {
    const store = await SessionStore.open(createTempWorkspace(), { now: () => 1234 });

    const record = await store.create(dataset, "sales.csv");

    expect(record).toMatchObject({
      description: SALES_DESCRIPTION,
      rowCount: 5,
      columnCount: 4,
      source: "sales.csv",
      createdAt: 1234,
    });
    expect(await store.get(record.sessionId)).toEqual(record);
    expect(await store.load(record.sessionId)).toEqual(dataset);
  });

  it("deletes the snapshot and the record together", async () => {
    const store = await SessionStore.open(createTempWorkspace());
    const { sessionId, snapshotPath } = await store.create(dataset, "sales.csv");

    await store.delete(sessionId);

    expect(existsSync(snapshotPath)).toBe(false);
    await expect(store.get(sessionId)).rejects.toThrow(new NotFoundError(`Session not found: ${sessionId}`));
    await expect(store.load(sessionId)).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.delete(sessionId)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports a session whose snapshot vanished", async () => {
    const store = await SessionStore.open(createTempWorkspace());
    const { sessionId, snapshotPath } = await store.create(dataset, "sales.csv");
    rmSync(snapshotPath);

    await expect(store.load(sessionId)).rejects.toThrow(new NotFoundError(`Session data not found: ${sessionId}`));
  });

  it("sweeps by age", async () => {
    let clock = 1000;
    const store = await SessionStore.open(createTempWorkspace(), { now: () => clock });
    const older = await store.create(dataset, "a.csv");
    clock = 5000;
    const newer = await store.create(dataset, "b.csv");
    clock = 6000;

    expect(await store.sweep(Infinity)).toBe(0);
    expect(await store.sweep(2000)).toBe(1);
    await expect(store.get(older.sessionId)).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.get(newer.sessionId)).toEqual(newer);
    expect(await store.sweep(0)).toBe(1);
    expect(store.size).toBe(0);
  });

  it("skips entries it cannot remove and keeps sweeping", async () => {
    const store = await SessionStore.open(createTempWorkspace());
    const stuck = await store.create(dataset, "a.csv");
    const removable = await store.create(dataset, "b.csv");
    rmSync(stuck.snapshotPath);
    mkdirSync(stuck.snapshotPath);

    expect(await store.sweep(0)).toBe(1);
    expect(await store.get(stuck.sessionId)).toEqual(stuck);
    expect(existsSync(removable.snapshotPath)).toBe(false);
  });

  it("removes its directory on dispose", async () => {
    const store = await SessionStore.open(createTempWorkspace());
    await store.create(dataset, "sales.csv");

    await store.dispose();

    expect(existsSync(store.directory)).toBe(false);
    expect(store.size).toBe(0);
  });
});
