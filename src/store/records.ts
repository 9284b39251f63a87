import { randomUUID } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PersistenceError, RecordNotFoundError } from "../errors.js";
import {
  isSummaryResult,
  readAnswer,
  readReferences,
  readResponseTime,
  type ReferenceRecord,
  type SummaryResult,
} from "../summary/types.js";

export interface SummaryRecordInput {
  answer: string;
  references: ReferenceRecord[];
  responseTime: number;
}

export interface SummaryRecord extends SummaryRecordInput {
  id: string;
}

export interface RecordStore {
  save(input: SummaryRecordInput): Promise<SummaryRecord>;
  get(id: string): Promise<SummaryRecord>;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isRecordId(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function createSummaryRecord(input: SummaryRecordInput): SummaryRecord {
  return {
    id: randomUUID(),
    answer: input.answer,
    references: input.references.map((reference) => ({ ...reference })),
    responseTime: Math.trunc(input.responseTime),
  };
}

/** Builds the persisted shape; a `responseTime` reported by the API wins over the measured one. */
export function recordFromResult(result: SummaryResult, elapsedMs: number): SummaryRecordInput {
  return {
    answer: readAnswer(result),
    references: readReferences(result),
    responseTime: readResponseTime(result) ?? Math.round(elapsedMs),
  };
}

export class FileRecordStore implements RecordStore {
  constructor(private readonly rootDir: string) {}

  async save(input: SummaryRecordInput): Promise<SummaryRecord> {
    const record = createSummaryRecord(input);
    try {
      await mkdir(this.rootDir, { recursive: true });
      await writeFile(this.pathFor(record.id), JSON.stringify(record, null, 2), { flag: "wx" });
    } catch (error) {
      throw new PersistenceError(`Failed to write record ${record.id}: ${describe(error)}`, { cause: error });
    }
    return record;
  }

  async get(id: string): Promise<SummaryRecord> {
    if (!isRecordId(id)) {
      throw new RecordNotFoundError(id);
    }

    let raw: string;
    try {
      raw = await readFile(this.pathFor(id), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        throw new RecordNotFoundError(id);
      }
      throw new PersistenceError(`Failed to read record ${id}: ${describe(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Stored record ${id} is not valid JSON`, { cause: error });
    }
    if (!isSummaryResult(parsed)) {
      throw new PersistenceError(`Stored record ${id} is not an object`);
    }

    const responseTime = readResponseTime(parsed);
    if (typeof parsed.answer !== "string" || !Array.isArray(parsed.references) || responseTime === undefined) {
      throw new PersistenceError(`Stored record ${id} is missing answer, references or responseTime`);
    }

    return {
      id,
      answer: parsed.answer,
      references: readReferences(parsed),
      responseTime,
    };
  }

  private pathFor(id: string): string {
    return join(this.rootDir, `${id.toLowerCase()}.json`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
