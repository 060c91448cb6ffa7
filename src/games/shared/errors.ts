export class ArcadeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArcadeError';
  }
}

/**
 * Raised when a host is started without a usable terminal.
 */
export class AbsentSurfaceError extends ArcadeError {
  constructor(readonly host: string) {
    super(`${host}: terminal is missing or has been disposed`);
    this.name = 'AbsentSurfaceError';
  }
}
