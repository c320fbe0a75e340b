export class RelayConfigError extends Error {
  constructor(
    message: string,
    readonly problems: string[] = [],
  ) {
    super(problems.length > 0 ? `${message}:\n- ${problems.join('\n- ')}` : message);
    this.name = 'RelayConfigError';
  }
}
