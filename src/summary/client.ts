import { isSummaryResult, type SummaryLogger, type SummaryOutcome, type SummaryResult, type Summarizer } from "./types.js";

export const DEFAULT_SUMMARY_BASE_URL = "https://lifeguide-rest-genai.api-mp.swissre.com";
export const DEFAULT_SESSION_ID = "123456";

export const SUMMARY_ROUTING = {
  product_type: ["life1"],
  contentType: "info",
  language: "en-eu",
  ratingType: "adult",
} as const;

const AUTH_USER = "Securian";

export interface SummaryClientOptions {
  token: string;
  baseUrl?: string;
  sessionId?: string;
  /** Aborts the request after this many ms; omitted means the transport default. */
  timeoutMs?: number;
  logger?: SummaryLogger;
}

export class SummaryClient implements Summarizer {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly sessionId: string;
  private readonly timeoutMs: number | undefined;
  private readonly logger: SummaryLogger;

  constructor(options: SummaryClientOptions) {
    if (!options.token?.trim()) {
      throw new Error("Summary API token is required; set SUMMARY_API_TOKEN in .env or pass --token");
    }
    this.token = options.token.trim();
    this.baseUrl = (options.baseUrl?.trim() || DEFAULT_SUMMARY_BASE_URL).replace(/\/$/, "");
    this.sessionId = options.sessionId?.trim() || DEFAULT_SESSION_ID;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? console;
  }

  async summarize(text: string): Promise<SummaryOutcome> {
    const payload = {
      product_type: [...SUMMARY_ROUTING.product_type],
      summary: text,
      contentType: SUMMARY_ROUTING.contentType,
      language: SUMMARY_ROUTING.language,
      ratingType: SUMMARY_ROUTING.ratingType,
    };

    const controller = this.timeoutMs === undefined ? undefined : new AbortController();
    const timeoutId = controller ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;

    let response: Response;
    let body: string;
    try {
      response = await fetch(`${this.baseUrl}/summary`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.token}`,
          "Content-Type": "application/json",
          "X-sr-auth-user": AUTH_USER,
          "session-id": this.sessionId,
        },
        body: JSON.stringify(payload),
        signal: controller?.signal,
      });
      body = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail({ ok: false, reason: "transport", message: `Summary request failed: ${message}` });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const detail = body.trim() ? `: ${body.trim()}` : "";
      return this.fail({
        ok: false,
        reason: "http",
        status: response.status,
        message: `Summary API error ${response.status}${detail}`,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return this.fail({
        ok: false,
        reason: "invalid-json",
        status: response.status,
        message: "Summary API response is not valid JSON",
      });
    }

    if (!isSummaryResult(parsed)) {
      return this.fail({
        ok: false,
        reason: "unexpected-body",
        status: response.status,
        message: "Summary API response is not a JSON object",
      });
    }

    return { ok: true, status: response.status, result: parsed };
  }

  /** Returns the endpoint's object on success and `{}` on any failure. */
  async fetchSummary(text: string): Promise<SummaryResult> {
    const outcome = await this.summarize(text);
    return outcome.ok ? outcome.result : {};
  }

  private fail(outcome: Extract<SummaryOutcome, { ok: false }>): SummaryOutcome {
    this.logger.warn(`[warn] ${outcome.message}`);
    return outcome;
  }
}
