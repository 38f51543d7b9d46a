/**
 * Denoise Error Types
 *
 * Transport failures (connect, send, receive) are recoverable and handled where
 * they occur. Configuration violations and lifecycle misuse are contract breaches
 * of the integrating pipeline and are left to propagate.
 */

export class DenoiseTransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'DenoiseTransportError';
  }
}

export class ConnectionFailureError extends DenoiseTransportError {
  constructor(url: string, cause?: unknown) {
    super(`Could not connect to denoise endpoint ${url}`, cause);
    this.name = 'ConnectionFailureError';
  }
}

export class SendFailureError extends DenoiseTransportError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'SendFailureError';
  }
}

export class ReceiveFailureError extends DenoiseTransportError {
  constructor(cause?: unknown) {
    super('Receiving denoised audio failed', cause);
    this.name = 'ReceiveFailureError';
  }
}

export class ConfigurationViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationViolationError';
  }
}

export class DenoiseStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DenoiseStateError';
  }
}

export class EnvValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Environment validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'EnvValidationError';
    this.issues = issues;
  }
}
