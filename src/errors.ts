export enum ErrorKind {
  Usage,
  InputUnreadable,
  EmptyRange,
  OutputUnwritable,
}

/** Fatal conversion error; the CLI reports its message and exits with 1. */
export class ConversionError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConversionError';
  }
}
