export class UpstreamTimeoutError extends Error {
  name = 'UpstreamTimeoutError';

  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Upstream did not respond within ${timeoutMs}ms`);
  }
}

export class UpstreamRequestError extends Error {
  name = 'UpstreamRequestError';

  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
