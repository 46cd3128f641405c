// Request fields never copied into an error:
// credentials and prompt content (PHI)
const REDACTED_FIELDS = [
  'authorization',
  'apiKey',
  'api_key',
  'token',
  'secret',
  'messages',
  'prompt',
  'content',
];

const RETRYABLE_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);

/**
 * LlmUpstreamError - Normalized failure of a chat-completions call
 *
 * Carries the upstream status, the request id and a redacted, truncated
 * copy of the request body. Prompt text never leaves the process this way.
 */
export class LlmUpstreamError extends Error {
  /**
   * HTTP status from the provider (502 for network errors)
   */
  readonly status: number;

  readonly requestId: string;

  readonly upstreamPath: string;

  /**
   * Redacted request body, max 200 chars
   */
  readonly upstreamBody: string | null;

  readonly timestamp: string;

  constructor(params: {
    status: number;
    message: string;
    requestId: string;
    upstreamPath: string;
    upstreamBody?: unknown;
  }) {
    super(params.message);
    this.name = 'LlmUpstreamError';
    this.status = params.status;
    this.requestId = params.requestId;
    this.upstreamPath = params.upstreamPath;
    this.timestamp = new Date().toISOString();
    this.upstreamBody = LlmUpstreamError.sanitizeBody(params.upstreamBody);

    Object.setPrototypeOf(this, LlmUpstreamError.prototype);
  }

  /**
   * Rate limits, provider-side errors and network failures
   */
  get retryable(): boolean {
    return RETRYABLE_STATUSES.has(this.status);
  }

  private static sanitizeBody(body: unknown): string | null {
    if (body === undefined || body === null || body === '') {
      return null;
    }

    let parsed: unknown = body;
    if (typeof body === 'string') {
      try {
        parsed = JSON.parse(body);
      } catch {
        // Free text may be prompt content
        return '[Unserializable body omitted]';
      }
    }

    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      return String(parsed).substring(0, 200);
    }

    const sanitized: Record<string, unknown> = { ...parsed };
    for (const key of Object.keys(sanitized)) {
      if (
        REDACTED_FIELDS.some(
          (field) => field.toLowerCase() === key.toLowerCase(),
        )
      ) {
        sanitized[key] = '[REDACTED]';
      }
    }

    return JSON.stringify(sanitized).substring(0, 200);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'LlmUpstreamError',
      message: this.message,
      status: this.status,
      requestId: this.requestId,
      upstreamPath: this.upstreamPath,
      timestamp: this.timestamp,
    };
  }

  static async fromResponse(
    response: Response,
    requestId: string,
    upstreamPath: string,
    requestBody?: unknown,
  ): Promise<LlmUpstreamError> {
    let message =
      `LLM upstream error: ${response.status} ${response.statusText}`.trim();
    try {
      const json: unknown = JSON.parse(await response.text());
      const detail = LlmUpstreamError.extractErrorMessage(json);
      if (detail) {
        message = detail;
      }
    } catch {
      // Keep the status line when the body is not JSON
    }

    return new LlmUpstreamError({
      status: response.status,
      message,
      requestId,
      upstreamPath,
      upstreamBody: requestBody,
    });
  }

  static fromNetworkError(
    error: Error,
    requestId: string,
    upstreamPath: string,
    requestBody?: unknown,
  ): LlmUpstreamError {
    return new LlmUpstreamError({
      status: 502,
      message: `Network error: ${error.message}`,
      requestId,
      upstreamPath,
      upstreamBody: requestBody,
    });
  }

  // OpenAI-style { error: { message } } or { error: "..." } / { message }
  private static extractErrorMessage(json: unknown): string | null {
    if (typeof json !== 'object' || json === null) {
      return null;
    }
    const error: unknown = 'error' in json ? json.error : undefined;
    if (typeof error === 'string') {
      return error;
    }
    if (typeof error === 'object' && error !== null && 'message' in error) {
      return typeof error.message === 'string' ? error.message : null;
    }
    if ('message' in json && typeof json.message === 'string') {
      return json.message;
    }
    return null;
  }
}
