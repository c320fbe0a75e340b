export class PushoverApiError extends Error {
  constructor(
    message: string,
    readonly httpStatus?: number,
    readonly errors: string[] = [],
  ) {
    super(message);
    this.name = 'PushoverApiError';
  }
}
