import type { KeyCombo } from '../../src/inject/directives.js';
import type { KeystrokeSink } from '../../src/inject/sink.js';
import type { TargetHandle } from '../../src/target/types.js';

/**
 * In-memory keystroke sink. Records every call as `alive`, `type:<text>` or
 * `keys:<k1 k2>`.
 */
export class FakeSink implements KeystrokeSink {
  readonly calls: string[] = [];
  /** Calls whose abort signal fired. */
  readonly aborted: string[] = [];
  alive = true;
  /** Return an error to make the matching call fail. */
  failOn?: (call: string) => Error | undefined;
  /** Call that only ends when aborted. */
  hangOn?: string;

  async isTargetAlive(_target: TargetHandle, _signal?: AbortSignal): Promise<boolean> {
    this.calls.push('alive');
    return this.alive;
  }

  typeText(_target: TargetHandle, text: string, signal?: AbortSignal): Promise<void> {
    return this.record(`type:${text}`, signal);
  }

  sendKeys(_target: TargetHandle, keys: KeyCombo[], signal?: AbortSignal): Promise<void> {
    return this.record(`keys:${keys.join(' ')}`, signal);
  }

  private record(call: string, signal?: AbortSignal): Promise<void> {
    this.calls.push(call);
    if (call === this.hangOn) {
      return new Promise<void>((_, reject) => {
        signal?.addEventListener('abort', () => {
          this.aborted.push(call);
          reject(new Error(`${call} aborted`));
        });
      });
    }
    const error = this.failOn?.(call);
    return error ? Promise.reject(error) : Promise.resolve();
  }
}
