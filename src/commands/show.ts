import type { AppConfig } from "../config.js";
import { writeReport } from "../report/report.js";
import { FileRecordStore, type RecordStore } from "../store/records.js";

export interface ShowOptions {
  id: string;
  config: AppConfig;
  out?: string;
  format?: string;
  recordStore?: RecordStore;
}

export async function runShow(options: ShowOptions) {
  const store = options.recordStore ?? new FileRecordStore(options.config.recordsDir);
  const record = await store.get(options.id.trim());
  return writeReport(record, {
    reportName: options.out || `record-${record.id}`,
    rootDir: options.config.reportsDir,
    format: options.format,
  });
}
