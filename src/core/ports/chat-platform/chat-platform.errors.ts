export class ChatPlatformRequestError extends Error {
  public constructor(
    public readonly operation: string,
    detail: string,
    public readonly httpStatus: number | null = null,
    options?: ErrorOptions,
  ) {
    super(`${operation} failed: ${detail}`, options);
    this.name = 'ChatPlatformRequestError';
  }
}
