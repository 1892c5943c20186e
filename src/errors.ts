import SemanticReleaseError from '@semantic-release/error';

export const BODY_SNIPPET_MAX = 256;
export const QUERY_ECHO_MAX = 200;

/**
 * Cut a string to `max` characters, marking the cut with "...".
 */
export function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}...` : s;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return typeof err === 'string' ? err : 'Unknown error';
}

/**
 * Prefix an error with the stage that raised it. The code of a
 * SemanticReleaseError is carried over so callers can still branch on it;
 * anything else gets `fallbackCode`.
 */
export function wrapError(
  stage: string,
  err: unknown,
  fallbackCode: string,
): SemanticReleaseError {
  if (err instanceof SemanticReleaseError) {
    return new SemanticReleaseError(
      `${stage}: ${err.message}`,
      err.code ?? fallbackCode,
      err.details,
    );
  }
  return new SemanticReleaseError(
    `${stage}: ${errorMessage(err)}`,
    fallbackCode,
  );
}

/**
 * Raised for any non-2xx answer from the execute endpoint. The message
 * holds the status, a trimmed excerpt of the response body and an echo of
 * the statement that was sent.
 */
export class ExecuteHttpError extends SemanticReleaseError {
  readonly status: number;
  readonly bodySnippet: string;
  readonly queryEcho: string;

  constructor(status: number, body: string, query: string) {
    const snippet = truncate(body, BODY_SNIPPET_MAX).trim();
    const echo = truncate(query, QUERY_ECHO_MAX);
    super(
      `edge http ${status}: ${snippet} | query: ${echo}`,
      'EHTTPSTATUS',
      snippet,
    );
    this.name = 'ExecuteHttpError';
    this.status = status;
    this.bodySnippet = snippet;
    this.queryEcho = echo;
  }
}
