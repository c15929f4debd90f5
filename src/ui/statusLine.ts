import * as readline from 'readline';
import type { Writable } from 'stream';
import type { FeedbackEvent } from '../engine/types.js';

export type FeedbackLevel = 'info' | 'warn' | 'error' | 'debug';

export interface FeedbackLine {
  level: FeedbackLevel;
  text: string;
}

function quote(text: string): string {
  return JSON.stringify(text);
}

/**
 * Turns an engine feedback event into one display line.
 */
export function describeFeedback(event: FeedbackEvent): FeedbackLine {
  switch (event.type) {
    case 'activated':
      return { level: 'info', text: '🟢 Voice Commander activated' };
    case 'deactivated':
      return {
        level: 'info',
        text: event.discarded
          ? `💤 Voice Commander deactivated (discarded ${quote(event.discarded)})`
          : '💤 Voice Commander deactivated',
      };
    case 'accumulating':
      return { level: 'info', text: `📝 accumulating: ${event.buffer}` };
    case 'finalized':
      return { level: 'info', text: '📨 Sent (Enter pressed)' };
    case 'edited':
      if (event.edit === 'removeWord') {
        return { level: 'info', text: `✂️  Removed last word: ${event.buffer}` };
      }
      return { level: 'info', text: event.edit === 'clearLine' ? '🧹 Cleared line' : '🧹 Started over' };
    case 'optionSelected':
      return { level: 'info', text: `🔢 Selected option ${event.option}` };
    case 'modeSwitched':
      return { level: 'info', text: '🔁 Changed operation mode' };
    case 'confirmed':
      return { level: 'info', text: `✅ Answered ${event.answer}` };
    case 'ignored':
      return { level: 'debug', text: `💤 Ignored (${event.activation}): ${quote(event.text)}` };
    case 'dispatched':
      return { level: 'debug', text: `⌨️  sent ${event.delivered} of ${event.directives.length}` };
    case 'dispatchFailed': {
      const progress = `${event.delivered}/${event.total} delivered`;
      switch (event.error.code) {
        case 'TARGET_LOST':
          return {
            level: 'error',
            text: `❌ error: target lost (${progress}). Type :recapture to pick the window again.`,
          };
        case 'TIMEOUT':
          return { level: 'error', text: `⏱️  error: ${event.error.message} (${progress})` };
        default:
          return { level: 'error', text: `❌ error: ${event.error.message} (${progress})` };
      }
    }
    case 'overflow':
      return {
        level: 'warn',
        text: `⚠️  Queue full (${event.capacity} waiting), dropped ${quote(event.text)}`,
      };
    case 'outOfOrder':
      return { level: 'warn', text: `⚠️  Out-of-order fragment dropped: ${quote(event.text)}` };
    case 'invalidTimestamp':
      return { level: 'warn', text: `⚠️  Fragment without a valid timestamp dropped: ${quote(event.text)}` };
    case 'retargeted':
      return { level: 'info', text: `🎯 Target window: ${event.target.name ?? event.target.id}` };
  }
}

/**
 * Status display that keeps the recognizer's partial text on one line, updated
 * in place, and prints feedback as stable lines above it.
 */
export class StatusLine {
  private partial = '';

  constructor(
    private readonly output: Writable = process.stdout,
    private readonly showDebug = false,
    private readonly prefix = '💬 '
  ) {}

  /**
   * Replace the in-place partial transcript.
   */
  showPartial(text: string): void {
    this.partial = text;
    this.clear();
    if (text) {
      this.output.write(this.prefix + text);
    }
  }

  /**
   * Print a stable line, keeping the partial transcript below it.
   */
  print(line: string): void {
    this.clear();
    this.output.write(`${line}\n`);
    if (this.partial) {
      this.output.write(this.prefix + this.partial);
    }
  }

  render(event: FeedbackEvent): void {
    const line = describeFeedback(event);
    if (line.level === 'debug' && !this.showDebug) {
      return;
    }
    if (event.type === 'accumulating' || event.type === 'finalized') {
      this.partial = '';
    }
    this.print(line.text);
  }

  close(): void {
    this.partial = '';
    this.clear();
  }

  private clear(): void {
    readline.cursorTo(this.output, 0);
    readline.clearLine(this.output, 0);
  }
}
