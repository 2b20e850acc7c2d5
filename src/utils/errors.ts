export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CollectorError';
  }
}

export class InputMissingError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_MISSING', details);
    this.name = 'InputMissingError';
  }
}

export class InputFormatError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_FORMAT', details);
    this.name = 'InputFormatError';
  }
}

export class BrowserLaunchError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BROWSER_LAUNCH', details);
    this.name = 'BrowserLaunchError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
