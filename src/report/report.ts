import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { SummaryRecord } from "../store/records.js";
import { referenceLabel, type ReferenceRecord } from "../summary/types.js";
import { formatDuration } from "../utils/duration.js";
import { sanitizeReportName } from "../utils/path.js";
import { escapeHtml, escapeTableCell, formatMultiline, isHttpUrl, stripMarkup } from "../utils/text.js";

export interface ReportMeta {
  generatedAt: string;
  recordId: string;
  responseTime: string;
  referenceCount: number;
}

export interface ReportPayload {
  meta: ReportMeta;
  record: SummaryRecord;
}

export type ReportFormat = "markdown" | "html";

export async function writeReport(
  record: SummaryRecord,
  options: { reportName: string; rootDir: string; format?: string; generatedAt?: Date },
) {
  const safeName = sanitizeReportName(options.reportName);
  const reportDir = join(options.rootDir, safeName);
  const format = normalizeFormat(options.format);

  const payload: ReportPayload = {
    meta: {
      generatedAt: (options.generatedAt ?? new Date()).toISOString(),
      recordId: record.id,
      responseTime: formatDuration(record.responseTime),
      referenceCount: record.references.length,
    },
    record,
  };

  await mkdir(reportDir, { recursive: true });

  await writeFile(join(reportDir, "report.json"), JSON.stringify(payload, null, 2));
  if (format === "markdown") {
    await writeFile(join(reportDir, "report.md"), buildMarkdownReport(payload));
  } else {
    await writeFile(join(reportDir, "index.html"), buildIndexHtml(payload));
  }

  return { reportDir, format };
}

export function normalizeFormat(input?: string): ReportFormat {
  const value = (input ?? "markdown").trim().toLowerCase();
  if (value === "markdown" || value === "md") {
    return "markdown";
  }
  if (value === "html") {
    return "html";
  }
  throw new Error(`Invalid --format value: ${input}. Allowed: markdown, html.`);
}

export function answerText(answer: string): string {
  return stripMarkup(answer).trim();
}

export function buildMarkdownReport(payload: ReportPayload): string {
  const { meta, record } = payload;
  const lines: string[] = [];
  lines.push("# Clinical Summary");
  lines.push("");
  lines.push(`Generated: ${meta.generatedAt}`);
  lines.push(`Record: ${meta.recordId}`);
  lines.push(`Response time: ${meta.responseTime}`);
  lines.push("");
  lines.push("## Answer");
  lines.push("");
  lines.push(answerText(record.answer) || "(no answer)");
  lines.push("");

  if (record.references.length > 0) {
    lines.push("## References");
    lines.push("");
    lines.push("| Ref # | Label | Link |");
    lines.push("| --- | --- | --- |");
    for (const reference of record.references) {
      lines.push(buildMarkdownRow(reference));
    }
  }

  return lines.join("\n").trimEnd() + "\n";
}

function referenceNumberText(reference: ReferenceRecord): string {
  return reference.referenceNumber === undefined ? "" : String(reference.referenceNumber);
}

function buildMarkdownRow(reference: ReferenceRecord): string {
  const url = reference.externalURL?.trim() ?? "";
  const link = isHttpUrl(url) ? `<${escapeTableCell(url)}>` : escapeTableCell(url);
  const cells = [escapeTableCell(referenceNumberText(reference)), escapeTableCell(referenceLabel(reference)), link];
  return `| ${cells.join(" | ")} |`;
}

function buildReferenceRowsHtml(references: ReferenceRecord[]): string {
  return references
    .map((reference) => {
      const url = reference.externalURL;
      const link =
        url && isHttpUrl(url) ? `<a href="${escapeHtml(url)}" target="_blank" rel="noreferrer">${escapeHtml(url)}</a>` : escapeHtml(url ?? "");
      return `
          <tr>
            <td class="num">${escapeHtml(referenceNumberText(reference))}</td>
            <td>${escapeHtml(referenceLabel(reference))}</td>
            <td>${link}</td>
          </tr>
        `;
    })
    .join("\n");
}

function buildIndexHtml(payload: ReportPayload): string {
  const { meta, record } = payload;
  const answer = answerText(record.answer);
  const answerHtml = answer ? formatMultiline(answer) : `<span class="empty">(no answer)</span>`;
  const references = record.references.length
    ? `<section class="card">
      <h2>References</h2>
      <table>
        <thead><tr><th>Ref #</th><th>Label</th><th>Link</th></tr></thead>
        <tbody>
        ${buildReferenceRowsHtml(record.references)}
        </tbody>
      </table>
    </section>`
    : "";

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Clinical Summary ${escapeHtml(meta.recordId)}</title>
  <style>
    body { font-family: "SF Pro Text", "Segoe UI", system-ui, -apple-system, sans-serif; margin: 0; background: #f1f4f4; color: #1b1b1f; }
    header { padding: 32px 24px; background: #80a651; color: #f9fafb; }
    header h1 { margin: 0 0 8px; font-size: 26px; }
    header p { margin: 0; color: #f1f8e6; }
    main { max-width: 900px; margin: -24px auto 40px; padding: 0 20px; display: grid; gap: 20px; }
    .card { background: #fff; border: 1px solid #dddddd; border-radius: 10px; padding: 24px; box-shadow: 0 12px 24px rgba(15, 23, 42, 0.06); }
    .answer { border-left: 6px solid #80a651; font-family: ui-serif, Georgia, "Times New Roman", serif; font-size: 1.12rem; line-height: 1.75; }
    .empty { color: #6b7280; font-style: italic; }
    h2 { margin: 0 0 12px; color: #80a651; font-size: 18px; }
    table { width: 100%; border-collapse: collapse; font-size: 14px; }
    th, td { text-align: left; padding: 8px; border-bottom: 1px solid #eef0f4; vertical-align: top; }
    td.num { width: 64px; font-variant-numeric: tabular-nums; }
    a { color: #2563eb; text-decoration: none; word-break: break-all; }
  </style>
</head>
<body>
  <header>
    <h1>Clinical Summary</h1>
    <p>Generated ${escapeHtml(meta.generatedAt)} · Record ${escapeHtml(meta.recordId)} · ${escapeHtml(meta.responseTime)}</p>
  </header>
  <main>
    <section class="card answer">
      ${answerHtml}
    </section>
    ${references}
  </main>
</body>
</html>`;
}
