import { afterEach, describe, expect, it, vi } from 'vitest';
import type { RunResult } from '../../src/exec/runner.js';
import { captureFocusedWindow } from '../../src/target/capture.js';

function result(overrides: Partial<RunResult> = {}): RunResult {
  return { stdout: '', stderr: '', exitCode: 0, success: true, timedOut: false, aborted: false, ...overrides };
}

async function fakeXdotool(_command: string, args: string[]): Promise<RunResult> {
  switch (args[0]) {
    case 'getwindowfocus':
      return result({ stdout: '62914565' });
    case 'getwindowname':
      return result({ stdout: 'assistant - bash' });
    default:
      return result({ success: false, exitCode: 1, stderr: 'unknown' });
  }
}

afterEach(() => {
  vi.useRealTimers();
});

describe('captureFocusedWindow', () => {
  it('records the focused window', async () => {
    const target = await captureFocusedWindow({ countdownSeconds: 0, run: fakeXdotool });

    expect(target).toEqual({ id: '62914565', name: 'assistant - bash', windowClass: undefined });
  });

  it('counts down before reading the focus', async () => {
    vi.useFakeTimers();
    const ticks: number[] = [];

    const pending = captureFocusedWindow({
      countdownSeconds: 2,
      onTick: (remaining) => ticks.push(remaining),
      run: fakeXdotool,
    });
    await vi.advanceTimersByTimeAsync(2000);

    await expect(pending).resolves.toMatchObject({ id: '62914565' });
    expect(ticks).toEqual([2, 1]);
  });

  it('fails when no window has focus', async () => {
    const run = async (): Promise<RunResult> =>
      result({ success: false, exitCode: 1, stderr: "Can't open display" });

    await expect(captureFocusedWindow({ countdownSeconds: 0, run })).rejects.toThrow(
      "Failed to get focused window: Can't open display"
    );
  });
});
