import type { TargetHandle } from '../target/types.js';
import type { KeyCombo } from './directives.js';

/**
 * OS-level keystroke synthesis, scoped to one target window.
 *
 * Every call takes the dispatcher's abort signal. Once it fires, the call must
 * stop sending keystrokes and settle promptly: the dispatcher waits for it before
 * the next directive starts.
 */
export interface KeystrokeSink {
  /** True when the window still exists and can take focus. */
  isTargetAlive(target: TargetHandle, signal?: AbortSignal): Promise<boolean>;
  typeText(target: TargetHandle, text: string, signal?: AbortSignal): Promise<void>;
  /** Sends each combination in order. */
  sendKeys(target: TargetHandle, keys: KeyCombo[], signal?: AbortSignal): Promise<void>;
}
