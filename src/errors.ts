export class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection, DNS or timeout failure while fetching a page. */
export class NetworkError extends ScrapeError {}

export class HttpStatusError extends ScrapeError {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly url: string,
  ) {
    const kind = status >= 500 ? "Server Error" : "Client Error";
    super(`${status} ${kind}: ${statusText} for url: ${url}`);
  }
}

export class ToolInputError extends Error {
  constructor(
    readonly toolName: string,
    readonly issues: string[],
  ) {
    super(`Invalid input for ${toolName}: ${issues.join("; ")}`);
    this.name = "ToolInputError";
  }
}

export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = "UnknownToolError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
