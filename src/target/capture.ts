import { runCommand } from '../exec/runner.js';
import type { CommandRunner } from '../inject/xdotoolSink.js';
import type { TargetHandle } from './types.js';

export interface CaptureOptions {
  xdotoolPath?: string;
  /** Seconds the user has to focus the terminal. */
  countdownSeconds?: number;
  /** Called once per remaining second, before the window is read. */
  onTick?: (remaining: number) => void;
  run?: CommandRunner;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Waits for the user to focus the terminal running the assistant, then records
 * the focused window as the injection target.
 */
export async function captureFocusedWindow(options: CaptureOptions = {}): Promise<TargetHandle> {
  const xdotoolPath = options.xdotoolPath || 'xdotool';
  const run = options.run ?? runCommand;
  const countdown = options.countdownSeconds ?? 10;

  for (let remaining = countdown; remaining > 0; remaining--) {
    options.onTick?.(remaining);
    await sleep(1000);
  }

  const focus = await run(xdotoolPath, ['getwindowfocus'], { timeoutMs: 3000 });
  if (!focus.success || !focus.stdout) {
    throw new Error(`Failed to get focused window: ${focus.stderr || 'xdotool returned nothing'}`);
  }

  const id = focus.stdout.split('\n')[0].trim();
  const [name, windowClass] = await Promise.all([
    run(xdotoolPath, ['getwindowname', id], { timeoutMs: 1000 }),
    run(xdotoolPath, ['getwindowclassname', id], { timeoutMs: 1000 }),
  ]);

  return {
    id,
    name: name.success ? name.stdout : undefined,
    windowClass: windowClass.success ? windowClass.stdout : undefined,
  };
}
