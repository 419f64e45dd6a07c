/** Roster file or environment could not be loaded; fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type AdmissionFailure = 'duplicate' | 'capacity' | 'cancelled';

export class AdmissionError extends Error {
  constructor(readonly reason: AdmissionFailure, message: string) {
    super(message);
    this.name = 'AdmissionError';
  }
}

export class CaptureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CaptureError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
