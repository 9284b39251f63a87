export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatMultiline(input: string): string {
  return escapeHtml(input).replace(/\n/g, "<br />");
}

export function stripMarkup(input: string): string {
  return input.replace(/<[^>]+>/g, "");
}

// Markdown table cells cannot hold pipes or line breaks.
export function escapeTableCell(input: string): string {
  return input.replace(/\|/g, "\\|").replace(/\r?\n/g, " ").trim();
}

export function isHttpUrl(input: string): boolean {
  return /^https?:\/\//i.test(input.trim());
}
