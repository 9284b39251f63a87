export type SummaryResult = Record<string, unknown>;

export interface ReferenceRecord {
  /** As sent by the API; usually an integer, occasionally a string or absent. */
  referenceNumber?: number | string;
  label: string;
  externalURL?: string;
}

export type SummaryFailureReason = "transport" | "http" | "invalid-json" | "unexpected-body";

export type SummaryOutcome =
  | { ok: true; status: number; result: SummaryResult }
  | { ok: false; reason: SummaryFailureReason; message: string; status?: number };

export interface Summarizer {
  summarize(text: string): Promise<SummaryOutcome>;
}

export interface SummaryLogger {
  warn(message: string): void;
}

export function isSummaryResult(value: unknown): value is SummaryResult {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readAnswer(result: SummaryResult): string {
  return typeof result.answer === "string" ? result.answer : "";
}

export function readReferences(result: SummaryResult): ReferenceRecord[] {
  if (!Array.isArray(result.references)) {
    return [];
  }
  const references: ReferenceRecord[] = [];
  for (const entry of result.references) {
    if (!isSummaryResult(entry)) {
      continue;
    }
    const reference: ReferenceRecord = { label: typeof entry.label === "string" ? entry.label : "" };
    if (typeof entry.referenceNumber === "number" || typeof entry.referenceNumber === "string") {
      reference.referenceNumber = entry.referenceNumber;
    }
    if (typeof entry.externalURL === "string") {
      reference.externalURL = entry.externalURL;
    }
    references.push(reference);
  }
  return references;
}

export function referenceLabel(reference: ReferenceRecord): string {
  return reference.label || reference.externalURL || "";
}

export function readResponseTime(result: SummaryResult): number | undefined {
  const value = result.responseTime;
  return typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : undefined;
}
