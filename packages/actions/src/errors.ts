export class InvalidActionError extends Error {
  constructor(public readonly action: unknown) {
    super(`Invalid action: ${JSON.stringify(action)}`);
    this.name = 'InvalidActionError';
  }
}
