import * as readline from 'readline';
import type { Readable } from 'stream';
import type { Fragment } from '../engine/types.js';

export type SourceCommand = 'status' | 'recapture' | 'quit';

const COMMANDS: ReadonlySet<string> = new Set<SourceCommand>(['status', 'recapture', 'quit']);

function isSourceCommand(value: string): value is SourceCommand {
  return COMMANDS.has(value);
}

type FragmentHandler = (fragment: Fragment) => void;
type CommandHandler = (command: SourceCommand) => void;
type UnknownCommandHandler = (line: string) => void;

/**
 * Reads fragments line by line, for driving the engine by typing or from a
 * recognizer piped into stdin. Each line is one fragment with confidence 1.
 * Lines starting with ':' are commands for the CLI (`:status`, `:recapture`, `:quit`).
 */
export class StdinFragmentSource {
  private rl: readline.Interface | null = null;
  private fragmentHandlers: FragmentHandler[] = [];
  private commandHandlers: CommandHandler[] = [];
  private unknownHandlers: UnknownCommandHandler[] = [];
  private closed: Promise<void> | null = null;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Starts reading. Resolves when the input ends or `close()` is called.
   */
  start(): Promise<void> {
    if (this.closed) {
      return this.closed;
    }

    const rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl = rl;
    this.closed = new Promise<void>((resolve) => {
      rl.once('close', () => {
        this.rl = null;
        resolve();
      });
    });

    rl.on('line', (line: string) => this.handleLine(line));
    return this.closed;
  }

  onFragment(cb: FragmentHandler): void {
    this.fragmentHandlers.push(cb);
  }

  onCommand(cb: CommandHandler): void {
    this.commandHandlers.push(cb);
  }

  onUnknownCommand(cb: UnknownCommandHandler): void {
    this.unknownHandlers.push(cb);
  }

  close(): void {
    this.rl?.close();
  }

  private handleLine(line: string): void {
    const text = line.trim();
    if (!text) {
      return;
    }

    if (text.startsWith(':')) {
      const command = text.slice(1).trim().toLowerCase();
      if (isSourceCommand(command)) {
        this.commandHandlers.forEach((cb) => cb(command));
      } else {
        this.unknownHandlers.forEach((cb) => cb(text));
      }
      return;
    }

    const fragment: Fragment = { text, confidence: 1, timestamp: this.clock() };
    this.fragmentHandlers.forEach((cb) => cb(fragment));
  }
}
