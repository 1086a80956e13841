import type { DeviceState, RegionId } from '@ewelink-bridge/shared';
import {
  type BridgeErrorCode,
  type BridgeErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_SIGNATURE_REJECTED,
  ERROR_CODE_EXPIRED_OR_INVALID,
  ERROR_REGIONS_EXHAUSTED,
  ERROR_UNAUTHENTICATED,
  ERROR_TOKEN_EXPIRED,
  ERROR_REGION_MISMATCH,
  ERROR_NETWORK_UNAVAILABLE,
  ERROR_MALFORMED_RESPONSE,
  ERROR_DEVICE_COMMAND_REJECTED,
  ERROR_SEQUENCE_ABORTED,
  ERROR_SEQUENCE_CANCELLED,
  ERROR_INVALID_REQUEST,
  ERROR_UNAUTHORIZED,
  ERROR_FORBIDDEN,
  ERROR_RATE_LIMITED,
  ERROR_CONFIGURATION,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * One failed (region, signature strategy) attempt
 */
export interface AttemptFailure {
  region: RegionId;
  strategy?: string;
  code: BridgeErrorCode;
  message: string;
  providerCode?: number;
}

/**
 * Bridge error response body
 */
export interface BridgeErrorResponse {
  error: BridgeErrorCode;
  error_description?: string;
  provider_code?: number;
  attempts?: AttemptFailure[];
  details?: Record<string, unknown>;
}

export interface BridgeErrorOptions {
  cause?: unknown;
  providerCode?: number;
  providerMessage?: string;
  attempts?: AttemptFailure[];
  details?: Record<string, unknown>;
}

/**
 * Bridge error class
 * Every failure surfaced by the core carries one of the bridge error codes
 */
export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly statusCode: BridgeErrorStatus;
  public readonly description: string;
  public readonly providerCode?: number;
  public readonly providerMessage?: string;
  public readonly attempts: AttemptFailure[];
  public readonly details?: Record<string, unknown>;

  constructor(code: BridgeErrorCode, description?: string, options: BridgeErrorOptions = {}) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'BridgeError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;
    this.attempts = options.attempts ?? [];

    if (options.providerCode !== undefined) {
      this.providerCode = options.providerCode;
    }
    if (options.providerMessage !== undefined) {
      this.providerMessage = options.providerMessage;
    }
    if (options.details) {
      this.details = options.details;
    }
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): BridgeErrorResponse {
    const response: BridgeErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.providerCode !== undefined) {
      response.provider_code = this.providerCode;
    }

    if (this.attempts.length > 0) {
      response.attempts = this.attempts;
    }

    if (this.details) {
      response.details = this.details;
    }

    return response;
  }

  // Factory methods for common errors

  static signatureRejected(attempts: AttemptFailure[], description?: string): BridgeError {
    return new BridgeError(ERROR_SIGNATURE_REJECTED, description, { attempts });
  }

  static codeExhausted(description?: string, options?: BridgeErrorOptions): BridgeError {
    return new BridgeError(ERROR_CODE_EXPIRED_OR_INVALID, description, options);
  }

  static regionsExhausted(attempts: AttemptFailure[], description?: string): BridgeError {
    return new BridgeError(ERROR_REGIONS_EXHAUSTED, description, { attempts });
  }

  static unauthenticated(description?: string): BridgeError {
    return new BridgeError(ERROR_UNAUTHENTICATED, description);
  }

  static tokenExpired(description?: string, options?: BridgeErrorOptions): BridgeError {
    return new BridgeError(ERROR_TOKEN_EXPIRED, description, options);
  }

  static regionMismatch(tokenRegion: RegionId, targetRegion: RegionId): BridgeError {
    return new BridgeError(
      ERROR_REGION_MISMATCH,
      `Token issued by region "${tokenRegion}" cannot be presented to region "${targetRegion}"`,
      { details: { tokenRegion, targetRegion } }
    );
  }

  static networkUnavailable(description?: string, cause?: unknown): BridgeError {
    return new BridgeError(ERROR_NETWORK_UNAVAILABLE, description, { cause });
  }

  static malformedResponse(description?: string, cause?: unknown): BridgeError {
    return new BridgeError(ERROR_MALFORMED_RESPONSE, description, { cause });
  }

  static deviceCommandRejected(providerCode: number, providerMessage: string | undefined): BridgeError {
    return new BridgeError(
      ERROR_DEVICE_COMMAND_REJECTED,
      `Device command rejected (error ${providerCode}): ${providerMessage ?? 'no message'}`,
      { providerCode, providerMessage }
    );
  }

  static invalidRequest(description?: string, details?: Record<string, unknown>): BridgeError {
    return new BridgeError(ERROR_INVALID_REQUEST, description, { details });
  }

  static unauthorized(description?: string): BridgeError {
    return new BridgeError(ERROR_UNAUTHORIZED, description);
  }

  static forbidden(description?: string): BridgeError {
    return new BridgeError(ERROR_FORBIDDEN, description);
  }

  static rateLimited(description?: string): BridgeError {
    return new BridgeError(ERROR_RATE_LIMITED, description);
  }

  static configuration(description?: string): BridgeError {
    return new BridgeError(ERROR_CONFIGURATION, description);
  }

  static serverError(description?: string, cause?: unknown): BridgeError {
    return new BridgeError(ERROR_SERVER_ERROR, description, { cause });
  }
}

/**
 * Failure of a scripted command sequence
 * Reports which step failed and the last state the device was successfully set to
 */
export class SequenceError extends BridgeError {
  public readonly failedStep: number;
  public readonly completedSteps: number;
  public readonly lastCommandedState: DeviceState | undefined;

  constructor(
    code: typeof ERROR_SEQUENCE_ABORTED | typeof ERROR_SEQUENCE_CANCELLED,
    description: string,
    progress: { failedStep: number; completedSteps: number; lastCommandedState: DeviceState | undefined },
    cause?: unknown
  ) {
    super(code, description, {
      cause,
      details: {
        failedStep: progress.failedStep,
        completedSteps: progress.completedSteps,
        lastCommandedState: progress.lastCommandedState ?? null,
      },
    });
    this.name = 'SequenceError';
    this.failedStep = progress.failedStep;
    this.completedSteps = progress.completedSteps;
    this.lastCommandedState = progress.lastCommandedState;
  }

  static aborted(
    failedStep: number,
    lastCommandedState: DeviceState | undefined,
    cause: BridgeError
  ): SequenceError {
    return new SequenceError(
      ERROR_SEQUENCE_ABORTED,
      `Step ${failedStep + 1} failed: ${cause.message}`,
      { failedStep, completedSteps: failedStep, lastCommandedState },
      cause
    );
  }

  static cancelled(nextStep: number, lastCommandedState: DeviceState | undefined): SequenceError {
    return new SequenceError(
      ERROR_SEQUENCE_CANCELLED,
      `Sequence cancelled before step ${nextStep + 1}`,
      { failedStep: nextStep, completedSteps: nextStep, lastCommandedState }
    );
  }
}

/**
 * Narrow an unknown thrown value to a BridgeError
 */
export function toBridgeError(err: unknown): BridgeError {
  if (err instanceof BridgeError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return BridgeError.serverError(message, err);
}
