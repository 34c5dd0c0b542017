import { err, ok, type Result } from "neverthrow";

export type HttpJsonRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

export type HttpJsonClientOptions = {
  /** Minimum spacing between consecutive requests, retries included. */
  minIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = async (ms: number): Promise<void> => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

/**
 * Shared GET-JSON transport with timeouts, bounded retries and request spacing,
 * so adapters honour upstream fair-access limits without their own timers.
 */
export class HttpJsonClient {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestAt: number | null = null;
  private slot: Promise<void> = Promise.resolve();

  constructor(options: HttpJsonClientOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolves to the decoded body; callers validate its shape.
   */
  async getJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.sleep(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  /**
   * Callers queue on `slot`, so concurrent requests reserve their turns one at a time.
   */
  private async waitForSlot(): Promise<void> {
    const turn = this.slot.then(() => this.reserveSlot());
    this.slot = turn.catch(() => undefined);
    await turn;
  }

  private async reserveSlot(): Promise<void> {
    if (this.lastRequestAt !== null && this.minIntervalMs > 0) {
      const elapsed = this.now() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
      }
    }

    this.lastRequestAt = this.now();
  }

  private async performRequest(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    await this.waitForSlot();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      try {
        const body: unknown = await response.json();
        return ok(body);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      if (error instanceof DOMException && error.name === "AbortError") {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
