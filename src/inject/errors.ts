/**
 * Injection errors.
 *
 * Every failure is local to one directive batch: it is reported to feedback and
 * processing continues with the next fragment.
 */

export type InjectionErrorCode = 'TARGET_LOST' | 'TIMEOUT' | 'KEYSTROKE_FAILED';

export abstract class InjectionError extends Error {
  abstract readonly code: InjectionErrorCode;
}

/**
 * The captured window no longer exists or cannot be focused.
 */
export class TargetLostError extends InjectionError {
  readonly code = 'TARGET_LOST';
  public readonly targetId: string;

  constructor(targetId: string, detail?: string) {
    super(`Target window ${targetId} is gone${detail ? `: ${detail}` : ''}`);
    this.name = 'TargetLostError';
    this.targetId = targetId;
  }
}

/**
 * A single directive did not complete against the keystroke sink in time.
 */
export class InjectionTimeoutError extends InjectionError {
  readonly code = 'TIMEOUT';
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Keystroke delivery timed out after ${timeoutMs}ms`);
    this.name = 'InjectionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The keystroke sink failed for any other reason.
 */
export class KeystrokeFailedError extends InjectionError {
  readonly code = 'KEYSTROKE_FAILED';

  constructor(cause: unknown) {
    super(`Keystroke delivery failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'KeystrokeFailedError';
  }
}
