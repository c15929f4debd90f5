import { runCommand, type RunOptions, type RunResult } from '../exec/runner.js';
import type { TargetHandle } from '../target/types.js';
import type { KeyCombo } from './directives.js';
import { TargetLostError } from './errors.js';
import type { KeystrokeSink } from './sink.js';

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export interface XdotoolSinkOptions {
  xdotoolPath?: string;
  /** Delay between typed characters, passed to `xdotool type --delay`. */
  typeDelayMs?: number;
  /** Pause between key combinations, so `ctrl+a` settles before `Delete`. */
  keySettleMs?: number;
  /** Kill timeout for each xdotool process, before typing time. */
  commandTimeoutMs?: number;
  debug?: boolean;
}

const WINDOW_GONE = /BadWindow|no such window|failed to find window|window .* does not exist/i;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Keystroke sink backed by xdotool (X11).
 *
 * Every delivery re-activates the captured window first, so keystrokes follow
 * the target even if focus moved while the user was speaking. An aborted call
 * kills the running xdotool process and starts no further ones.
 */
export class XdotoolSink implements KeystrokeSink {
  private readonly xdotoolPath: string;
  private readonly typeDelayMs: number;
  private readonly keySettleMs: number;
  private readonly commandTimeoutMs: number;
  private readonly debug: boolean;

  constructor(
    options: XdotoolSinkOptions = {},
    private readonly run: CommandRunner = runCommand
  ) {
    this.xdotoolPath = options.xdotoolPath || 'xdotool';
    this.typeDelayMs = options.typeDelayMs ?? 12;
    this.keySettleMs = options.keySettleMs ?? 100;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 5000;
    this.debug = !!options.debug;
  }

  async isTargetAlive(target: TargetHandle, signal?: AbortSignal): Promise<boolean> {
    const result = await this.xdotool(['getwindowname', target.id], this.commandTimeoutMs, signal);
    return result.success;
  }

  async typeText(target: TargetHandle, text: string, signal?: AbortSignal): Promise<void> {
    await this.activate(target, signal);
    await this.expect(
      target,
      ['type', '--clearmodifiers', '--delay', String(this.typeDelayMs), '--', text],
      this.commandTimeoutMs + text.length * this.typeDelayMs,
      signal
    );
  }

  async sendKeys(target: TargetHandle, keys: KeyCombo[], signal?: AbortSignal): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    await this.activate(target, signal);
    for (const [index, combo] of keys.entries()) {
      if (index > 0 && this.keySettleMs > 0) {
        await sleep(this.keySettleMs);
      }
      await this.expect(target, ['key', '--clearmodifiers', combo], this.commandTimeoutMs, signal);
    }
  }

  private async activate(target: TargetHandle, signal?: AbortSignal): Promise<void> {
    await this.expect(target, ['windowactivate', '--sync', target.id], this.commandTimeoutMs, signal);
  }

  private async expect(
    target: TargetHandle,
    args: string[],
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<void> {
    if (signal?.aborted) {
      throw new Error(`xdotool ${args[0]} aborted`);
    }

    const result = await this.xdotool(args, timeoutMs, signal);
    if (result.success) {
      return;
    }

    if (WINDOW_GONE.test(result.stderr)) {
      throw new TargetLostError(target.id, result.stderr);
    }
    const reason = result.aborted
      ? 'aborted'
      : result.timedOut
        ? 'timed out'
        : result.stderr || `exit code ${result.exitCode}`;
    throw new Error(`xdotool ${args[0]} failed: ${reason}`);
  }

  private async xdotool(args: string[], timeoutMs: number, signal?: AbortSignal): Promise<RunResult> {
    if (this.debug) {
      console.log(`[xdotool] ${args.join(' ')}`);
    }
    return this.run(this.xdotoolPath, args, { timeoutMs, signal });
  }
}
