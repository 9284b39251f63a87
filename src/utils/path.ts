export function sanitizeReportName(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return "summary";
  }

  const cleaned = trimmed.replace(/[\\/]+/g, "-").replace(/[^a-zA-Z0-9._-]/g, "-");
  const collapsed = cleaned.replace(/-+/g, "-").replace(/^[-.]+|[-.]+$/g, "");

  return collapsed || "summary";
}

export function defaultReportName(prefix: string, now: Date = new Date()): string {
  return `${prefix}-${now.toISOString().replace(/[:.]/g, "-")}`;
}
