import { afterAll, describe, expect, it } from "vitest";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PersistenceError, RecordNotFoundError } from "../src/errors.js";
import { FileRecordStore, createSummaryRecord, recordFromResult } from "../src/store/records.js";

const ROOT = join(process.cwd(), ".tmp-tests", "records");
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

afterAll(async () => {
  await rm(ROOT, { recursive: true, force: true });
});

describe("FileRecordStore", () => {
  it("writes a record under a fresh UUID", async () => {
    const store = new FileRecordStore(ROOT);
    const input = { answer: "ok", references: [], responseTime: 12 };

    const record = await store.save(input);

    expect(record.id).toMatch(UUID);
    expect(input).toEqual({ answer: "ok", references: [], responseTime: 12 });
    expect(record).toEqual({ id: record.id, answer: "ok", references: [], responseTime: 12 });
    const stored = JSON.parse(await readFile(join(ROOT, `${record.id}.json`), "utf8"));
    expect(stored).toEqual(record);
  });

  it("reads a stored record back", async () => {
    const store = new FileRecordStore(ROOT);
    const record = await store.save({
      answer: "<p>stable</p>",
      references: [{ referenceNumber: 1, label: "Guide", externalURL: "https://example.test/guide" }],
      responseTime: 40,
    });

    expect(await store.get(record.id)).toEqual(record);
  });

  it("does not find unknown or malformed ids", async () => {
    const store = new FileRecordStore(ROOT);
    await expect(store.get("00000000-0000-4000-8000-000000000000")).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(store.get("../secrets")).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it("raises a persistence error for an incomplete stored record", async () => {
    const id = "11111111-2222-4333-8444-555555555555";
    await mkdir(ROOT, { recursive: true });
    await writeFile(join(ROOT, `${id}.json`), JSON.stringify({ id, answer: "ok", references: [] }));
    const store = new FileRecordStore(ROOT);

    await expect(store.get(id)).rejects.toBeInstanceOf(PersistenceError);
    await expect(store.get(id)).rejects.toThrow(/missing answer, references or responseTime/);
  });

  it("raises a persistence error when the write fails", async () => {
    await mkdir(ROOT, { recursive: true });
    const blocker = join(ROOT, "blocker");
    await writeFile(blocker, "not a directory");
    const store = new FileRecordStore(join(blocker, "nested"));

    await expect(store.save({ answer: "ok", references: [], responseTime: 1 })).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe("createSummaryRecord", () => {
  it("copies the input and truncates the response time", () => {
    const references = [{ referenceNumber: 2, label: "Note" }];
    const record = createSummaryRecord({ answer: "ok", references, responseTime: 12.9 });

    expect(record.responseTime).toBe(12);
    expect(record.references).toEqual(references);
    expect(record.references[0]).not.toBe(references[0]);
  });
});

describe("recordFromResult", () => {
  it("prefers the response time reported by the API", () => {
    const input = recordFromResult(
      {
        answer: "<b>ok</b>",
        references: [{ referenceNumber: 1, label: "", externalURL: "https://example.test/a" }, "not an entry"],
        responseTime: 40.7,
      },
      999,
    );

    expect(input).toEqual({
      answer: "<b>ok</b>",
      references: [{ referenceNumber: 1, label: "", externalURL: "https://example.test/a" }],
      responseTime: 40,
    });
  });

  it("keeps references whose number is a string or missing", () => {
    const input = recordFromResult(
      {
        references: [
          { referenceNumber: "1", label: "L", externalURL: "https://example.test" },
          { label: "no number" },
          { referenceNumber: null, label: 7 },
        ],
      },
      5,
    );

    expect(input.references).toEqual([
      { referenceNumber: "1", label: "L", externalURL: "https://example.test" },
      { label: "no number" },
      { label: "" },
    ]);
  });

  it("falls back to the measured time for an empty result", () => {
    expect(recordFromResult({}, 12.4)).toEqual({ answer: "", references: [], responseTime: 12 });
  });
});
