import type { TargetHandle } from '../target/types.js';
import type { KeyCombo } from './directives.js';
import type { KeystrokeSink } from './sink.js';

/**
 * Prints keystrokes instead of sending them. The target is always alive.
 */
export class DryRunSink implements KeystrokeSink {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  async isTargetAlive(_target: TargetHandle): Promise<boolean> {
    return true;
  }

  async typeText(target: TargetHandle, text: string): Promise<void> {
    this.write(`⌨️  [${target.id}] type ${JSON.stringify(text)}`);
  }

  async sendKeys(target: TargetHandle, keys: KeyCombo[]): Promise<void> {
    this.write(`⌨️  [${target.id}] keys ${keys.join(' ')}`);
  }
}
