import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFileHistoryStore } from "../../src/storage/file/history.js";
import type { HistoryRecord } from "../../src/history/types.js";

function recordAt(timestamp: number, bill = 10): HistoryRecord {
  return { timestamp, bill, tipPercent: 15, partySize: 2, perPerson: 5.75, total: 11.5 };
}

describe("file history store", () => {
  let historyDir: string;
  let historyPath: string;

  beforeEach(async () => {
    historyDir = await mkdtemp(path.join(tmpdir(), "tipsplit-history-"));
    historyPath = path.join(historyDir, "nested", "tip_history.json");
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(historyDir, { recursive: true, force: true }).catch(() => undefined);
  });

  it("returns an empty log when the file does not exist", async () => {
    const store = createFileHistoryStore({ filePath: historyPath, limit: 20 });

    expect(await store.loadAll()).toEqual([]);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("writes the full log as a JSON array, newest first", async () => {
    const store = createFileHistoryStore({ filePath: historyPath, limit: 20 });

    expect(await store.append(recordAt(1, 10))).toEqual({ ok: true });
    expect(await store.append(recordAt(2, 20))).toEqual({ ok: true });

    const stored = JSON.parse(await readFile(historyPath, "utf8"));
    expect(stored).toEqual([
      { time: 2, bill: 20, tip_percent: 15, people: 2, per_person: 5.75, total: 11.5 },
      { time: 1, bill: 10, tip_percent: 15, people: 2, per_person: 5.75, total: 11.5 }
    ]);

    const records = await store.loadAll();
    expect(records.map((record) => record.timestamp)).toEqual([2, 1]);
  });

  it("keeps only the newest 20 entries", async () => {
    const store = createFileHistoryStore({ filePath: historyPath, limit: 20 });
    for (let timestamp = 1; timestamp <= 21; timestamp += 1) {
      await store.append(recordAt(timestamp));
    }

    const records = await store.loadAll();
    expect(records).toHaveLength(20);
    expect(records[0].timestamp).toBe(21);
    expect(records[19].timestamp).toBe(2);
    expect(records.some((record) => record.timestamp === 1)).toBe(false);
  });

  it("truncates an oversized file on load", async () => {
    await writeFile(
      path.join(historyDir, "big.json"),
      JSON.stringify(
        Array.from({ length: 25 }, (_, index) => ({
          time: 100 - index,
          bill: 1,
          tip_percent: 10,
          people: 1,
          per_person: 1.1,
          total: 1.1
        }))
      ),
      "utf8"
    );
    const store = createFileHistoryStore({ filePath: path.join(historyDir, "big.json"), limit: 20 });

    const records = await store.loadAll();
    expect(records).toHaveLength(20);
    expect(records[0].timestamp).toBe(100);
  });

  it.each([
    ["malformed JSON", "[{\"time\": 1,"],
    ["a non-array document", "{\"time\": 1}"],
    ["an entry with missing fields", "[{\"time\": 1, \"bill\": 5}]"]
  ])("treats %s as an empty log", async (_label, content) => {
    const filePath = path.join(historyDir, "corrupt.json");
    await writeFile(filePath, content, "utf8");
    const store = createFileHistoryStore({ filePath, limit: 20 });

    expect(await store.loadAll()).toEqual([]);
  });

  it("replaces a corrupt file on the next append", async () => {
    const filePath = path.join(historyDir, "corrupt.json");
    await writeFile(filePath, "not json", "utf8");
    const store = createFileHistoryStore({ filePath, limit: 20 });

    await store.append(recordAt(7));

    expect((await store.loadAll()).map((record) => record.timestamp)).toEqual([7]);
  });

  it("selects records by position and ignores invalid indices", async () => {
    const store = createFileHistoryStore({ filePath: historyPath, limit: 20 });
    await store.append(recordAt(1));
    await store.append(recordAt(2));

    expect((await store.select(0))?.timestamp).toBe(2);
    expect((await store.select(1))?.timestamp).toBe(1);
    expect(await store.select(2)).toBeNull();
    expect(await store.select(-1)).toBeNull();
    expect(await store.select(0.5)).toBeNull();
  });

  it("reports a failed write without throwing", async () => {
    const store = createFileHistoryStore({ filePath: historyDir, limit: 20 });

    const outcome = await store.append(recordAt(1));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(Error);
    }
    expect(await store.loadAll()).toEqual([]);
  });

  it("clears the log", async () => {
    const store = createFileHistoryStore({ filePath: historyPath, limit: 20 });
    await store.append(recordAt(1));

    expect(await store.clear()).toEqual({ ok: true });
    expect(await store.loadAll()).toEqual([]);
    expect(JSON.parse(await readFile(historyPath, "utf8"))).toEqual([]);
  });
});
