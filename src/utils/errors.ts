/**
 * Errors raised for caller bugs rather than data-quality problems
 */

export class EmptyInputError extends Error {
  constructor(operation: string) {
    super(`${operation} requires at least one input`);
    this.name = 'EmptyInputError';
  }
}
