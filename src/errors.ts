/**
 * Raised for sensor definitions or calendar inputs that cannot be used.
 * Hosts are expected to surface these rather than retry.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidWindowError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidWindowError';
  }
}

/**
 * The external remaining-duration signal is missing or unreadable.
 */
export class SignalUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SignalUnavailableError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
