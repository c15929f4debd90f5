import type { TargetHandle } from '../target/types.js';
import type { InjectionDirective } from './directives.js';
import {
  InjectionError,
  InjectionTimeoutError,
  KeystrokeFailedError,
  TargetLostError,
} from './errors.js';
import type { KeystrokeSink } from './sink.js';

export interface DispatcherOptions {
  /** Upper bound for one directive against the sink, before typing time. */
  directiveTimeoutMs?: number;
  /** Extra budget per typed character, so long dictations are not cut off. */
  typingMsPerCharacter?: number;
}

export type DispatchResult =
  | { ok: true; delivered: number }
  | { ok: false; delivered: number; error: InjectionError };

const DEFAULT_DIRECTIVE_TIMEOUT_MS = 5000;

/**
 * Runs one sink call under a deadline. On expiry the call is aborted, and the
 * timeout is only reported after the call has settled, so nothing it sends can
 * land after the next directive starts.
 */
async function withTimeout<T>(call: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const work = call(controller.signal);

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<'expired'>((resolve) => {
    timer = setTimeout(() => resolve('expired'), timeoutMs);
  });

  try {
    const first = await Promise.race([work.then((value) => ({ value })), expired]);
    if (first !== 'expired') {
      return first.value;
    }
  } finally {
    clearTimeout(timer);
  }

  controller.abort();
  // The outcome no longer matters; only that the sink is done.
  await Promise.allSettled([work]);
  throw new InjectionTimeoutError(timeoutMs);
}

function toInjectionError(error: unknown): InjectionError {
  return error instanceof InjectionError ? error : new KeystrokeFailedError(error);
}

/**
 * Delivers directive batches to the keystroke sink, strictly in order.
 *
 * The target is re-validated before each non-empty batch, so keystrokes never
 * land in whatever window happens to be focused once the captured one is gone.
 * When directive k fails, directives after k are not attempted.
 */
export class InjectionDispatcher {
  private readonly directiveTimeoutMs: number;
  private readonly typingMsPerCharacter: number;

  constructor(
    private readonly sink: KeystrokeSink,
    options: DispatcherOptions = {}
  ) {
    this.directiveTimeoutMs = options.directiveTimeoutMs ?? DEFAULT_DIRECTIVE_TIMEOUT_MS;
    this.typingMsPerCharacter = options.typingMsPerCharacter ?? 0;
  }

  async dispatch(
    directives: readonly InjectionDirective[],
    target: TargetHandle
  ): Promise<DispatchResult> {
    if (directives.length === 0) {
      return { ok: true, delivered: 0 };
    }

    try {
      const alive = await withTimeout(
        (signal) => this.sink.isTargetAlive(target, signal),
        this.directiveTimeoutMs
      );
      if (!alive) {
        return { ok: false, delivered: 0, error: new TargetLostError(target.id) };
      }
    } catch (error) {
      return { ok: false, delivered: 0, error: toInjectionError(error) };
    }

    let delivered = 0;
    for (const directive of directives) {
      try {
        await withTimeout((signal) => this.deliver(directive, target, signal), this.timeoutFor(directive));
      } catch (error) {
        return { ok: false, delivered, error: toInjectionError(error) };
      }
      delivered++;
    }

    return { ok: true, delivered };
  }

  timeoutFor(directive: InjectionDirective): number {
    if (directive.kind !== 'typeText') {
      return this.directiveTimeoutMs;
    }
    const length = directive.text.length + (directive.spaceBefore ? 1 : 0);
    return this.directiveTimeoutMs + length * this.typingMsPerCharacter;
  }

  private deliver(directive: InjectionDirective, target: TargetHandle, signal: AbortSignal): Promise<void> {
    if (directive.kind === 'typeText') {
      const text = directive.spaceBefore ? ` ${directive.text}` : directive.text;
      return this.sink.typeText(target, text, signal);
    }
    return this.sink.sendKeys(target, directive.keys, signal);
  }
}
