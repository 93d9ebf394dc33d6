/** Base class for errors that map onto an HTTP status. */
export class AppError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProtocolNotFoundError extends AppError {
  constructor(readonly input: string, readonly suggestions: string[]) {
    let message = `Protocol '${input}' not found.`;
    if (suggestions.length > 0) message += ` Did you mean: ${suggestions.join(', ')}?`;
    super(message, 404);
  }
}

export class DefiLlamaApiError extends AppError {
  constructor(message: string, readonly url: string) {
    super(message, 502);
  }
}
