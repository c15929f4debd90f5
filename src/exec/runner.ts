import { spawn } from 'child_process';

export interface RunOptions {
  /** Kill the process after this many milliseconds. */
  timeoutMs?: number;
  /** Kill the process when aborted. */
  signal?: AbortSignal;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  success: boolean;
  timedOut: boolean;
  aborted: boolean;
}

/**
 * Runs a command using spawn (never a shell, so typed text is never interpreted).
 * Never rejects: spawn failures come back as an unsuccessful result.
 *
 * @param command - Executable name or path
 * @param args - Arguments passed verbatim
 * @returns Trimmed stdout/stderr and exit status
 */
export async function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<RunResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
      timeout: options.timeoutMs,
      signal: options.signal,
      killSignal: 'SIGKILL',
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (result: RunResult) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(result);
    };

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code, signal) => {
      const exitCode = code ?? 1;
      finish({
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode,
        success: exitCode === 0,
        timedOut: code === null && signal === 'SIGKILL' && !options.signal?.aborted,
        aborted: !!options.signal?.aborted,
      });
    });

    child.on('error', (error) => {
      finish({
        stdout: '',
        stderr: error.message,
        exitCode: 1,
        success: false,
        timedOut: false,
        aborted: !!options.signal?.aborted,
      });
    });
  });
}
