export type ErrorCode =
  | 'ENGINE_INIT_FAILED'
  | 'BUS_OPEN_FAILED'
  | 'AUDIO_OVERRUN'
  | 'AUDIO_SOURCE_FAILED'
  | 'INVALID_CONFIG'
  | 'INVALID_ASSET'
  | 'CAMERA_UNAVAILABLE'
  | 'CAPTURE_FAILED';

export class AssistantError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AssistantError';
  }
}

/**
 * The pipeline cannot continue; the process should shut down.
 */
export class FatalError extends AssistantError {
  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'FatalError';
  }
}

export class ConfigError extends FatalError {
  constructor(message: string, code: 'INVALID_CONFIG' | 'INVALID_ASSET' = 'INVALID_CONFIG', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ConfigError';
  }
}

export class CaptureError extends AssistantError {
  constructor(message: string, code: 'CAMERA_UNAVAILABLE' | 'CAPTURE_FAILED', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'CaptureError';
  }
}

export function isFatal(error: unknown): error is FatalError {
  return error instanceof FatalError;
}
