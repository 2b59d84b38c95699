/**
 * Source Client Errors
 *
 * Raised inside the clients and caught there; a SourceError never reaches
 * the router. The code tells the client whether a tool-cache refresh is
 * warranted (CLIENT_STATUS with 400/404) or the call simply degrades.
 */

export const SourceErrorCodes = {
  NETWORK: 'NETWORK',
  TIMEOUT: 'TIMEOUT',
  CLIENT_STATUS: 'CLIENT_STATUS',
  SERVER_STATUS: 'SERVER_STATUS',
  MALFORMED_PAYLOAD: 'MALFORMED_PAYLOAD',
} as const;

export type SourceErrorCode = (typeof SourceErrorCodes)[keyof typeof SourceErrorCodes];

export class SourceError extends Error {
  public readonly code: SourceErrorCode;
  /** Backend label, e.g. "AWS Documentation" */
  public readonly source: string;
  /** HTTP status for *_STATUS codes */
  public readonly status?: number;
  public readonly cause?: Error;

  constructor(code: SourceErrorCode, source: string, message: string, status?: number, cause?: Error) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'SourceError';
    this.code = code;
    this.source = source;
    this.status = status;
    this.cause = cause;
  }

  /** 400/404 from a tool endpoint means the tool schema moved */
  get isSchemaDrift(): boolean {
    return this.code === SourceErrorCodes.CLIENT_STATUS && (this.status === 400 || this.status === 404);
  }

  static fromStatus(source: string, status: number, statusText: string): SourceError {
    const code = status >= 500 ? SourceErrorCodes.SERVER_STATUS : SourceErrorCodes.CLIENT_STATUS;
    return new SourceError(code, source, `${source} returned HTTP ${status} ${statusText}`.trim(), status);
  }

  static network(source: string, cause: unknown): SourceError {
    const error = cause instanceof Error ? cause : undefined;
    const detail = error?.message ?? String(cause);
    return new SourceError(SourceErrorCodes.NETWORK, source, `${source} request failed: ${detail}`, undefined, error);
  }

  static timeout(source: string, timeoutMs: number): SourceError {
    return new SourceError(SourceErrorCodes.TIMEOUT, source, `${source} timed out after ${timeoutMs}ms`);
  }

  static malformed(source: string, detail: string, cause?: Error): SourceError {
    return new SourceError(
      SourceErrorCodes.MALFORMED_PAYLOAD,
      source,
      `${source} sent an unexpected payload: ${detail}`,
      undefined,
      cause
    );
  }
}
