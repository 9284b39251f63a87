import type { AppConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { flattenDocument } from "../flatten/flatten.js";
import { buildPromptedInput } from "../prompt/clinical.js";
import { writeReport } from "../report/report.js";
import { FileRecordStore, createSummaryRecord, recordFromResult, type RecordStore } from "../store/records.js";
import { SummaryClient } from "../summary/client.js";
import type { SummaryFailureReason, SummaryLogger } from "../summary/types.js";
import { defaultReportName } from "../utils/path.js";
import { readJsonFile } from "./input.js";

export interface SummarizeOptions {
  input: string;
  config: AppConfig;
  out?: string;
  format?: string;
  store: boolean;
  printInput?: boolean;
  recordStore?: RecordStore;
  logger?: SummaryLogger;
  now?: Date;
}

export type SummarizeStatus =
  | { status: "completed"; recordId: string; stored: boolean; reportDir: string }
  | { status: "failed"; reason: SummaryFailureReason; message: string };

export async function runSummarize(options: SummarizeOptions): Promise<SummarizeStatus> {
  const { config } = options;
  const now = options.now ?? new Date();
  if (!config.token) {
    throw new ConfigError("Summary API token is required; set SUMMARY_API_TOKEN in .env or pass --token");
  }

  const data = await readJsonFile(options.input);
  const flattened = flattenDocument(data);
  if (options.printInput) {
    console.log(`JSON input as text:\n${flattened}`);
  }
  const promptedInput = buildPromptedInput(flattened, { now });

  const client = new SummaryClient({
    token: config.token,
    baseUrl: config.baseUrl,
    sessionId: config.sessionId,
    timeoutMs: config.timeoutMs,
    logger: options.logger,
  });

  const startedAt = Date.now();
  const outcome = await client.summarize(promptedInput);
  const elapsedMs = Date.now() - startedAt;

  if (!outcome.ok) {
    return { status: "failed", reason: outcome.reason, message: outcome.message };
  }

  const recordInput = recordFromResult(outcome.result, elapsedMs);
  const recordStore = options.recordStore ?? new FileRecordStore(config.recordsDir);
  const record = options.store ? await recordStore.save(recordInput) : createSummaryRecord(recordInput);

  const { reportDir } = await writeReport(record, {
    reportName: options.out || defaultReportName("summary", now),
    rootDir: config.reportsDir,
    format: options.format,
    generatedAt: now,
  });

  return { status: "completed", recordId: record.id, stored: options.store, reportDir };
}
