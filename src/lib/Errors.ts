export class InvalidBoardNameError extends Error {

  board: string;

  constructor(board: string) {
    super(`Invalid board name "${board}"`);
    this.name = 'InvalidBoardNameError';
    this.board = board;
  }
}

/**
 * Thrown when the API answers with a status the caller has no handling for.
 */
export class UnexpectedResponseError extends Error {

  status: number;
  url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`Unexpected response from "${url}": ${status}${statusText ? ` - ${statusText}` : ''}`);
    this.name = 'UnexpectedResponseError';
    this.status = status;
    this.url = url;
  }
}

export class InvalidQueryError extends Error {

  query: string;

  constructor(query: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid query "${query}": ${reason}`, { cause });
    this.name = 'InvalidQueryError';
    this.query = query;
  }
}
