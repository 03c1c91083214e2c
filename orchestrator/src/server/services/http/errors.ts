/**
 * Raised when an upstream API answers with a non-2xx status after all
 * retries are spent.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  readonly bodySnippet: string;
  readonly headers: Record<string, string>;

  constructor(args: {
    status: number;
    statusText: string;
    url: string;
    bodySnippet: string;
    headers: Record<string, string>;
  }) {
    super(`HTTP ${args.status} ${args.statusText} for ${args.url}`);
    this.name = "HttpError";
    this.status = args.status;
    this.statusText = args.statusText;
    this.url = args.url;
    this.bodySnippet = args.bodySnippet;
    this.headers = args.headers;
  }
}

export function isHttpError(error: unknown, status?: number): error is HttpError {
  if (!(error instanceof HttpError)) return false;
  return status === undefined || error.status === status;
}

/** One-line description of a failure, with the upstream body when there is one. */
export function describeError(error: unknown): string {
  if (isHttpError(error)) {
    return error.bodySnippet ? `${error.message}: ${error.bodySnippet}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
