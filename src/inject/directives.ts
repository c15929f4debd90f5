import type { ConfirmAnswer, OptionNumber } from '../grammar/types.js';

/**
 * A key or key combination in xdotool's `key` syntax, e.g. `ctrl+u`.
 */
export type KeyCombo = string;

/**
 * Shortcuts understood by the terminal assistant's input line.
 */
export const KEYS = {
  enter: 'Return',
  removeWord: 'alt+BackSpace',
  clearLine: 'ctrl+u',
  selectAll: 'ctrl+a',
  delete: 'Delete',
  cycleMode: 'shift+Tab',
} as const;

export const CONFIRM_KEYS: Record<ConfirmAnswer, KeyCombo> = {
  yes: 'y',
  no: 'n',
  quit: 'q',
  help: 'h',
};

export function optionKey(option: OptionNumber): KeyCombo {
  return String(option);
}

export interface TypeTextDirective {
  kind: 'typeText';
  text: string;
  /** Type one separating space first; set when continuing an accumulation. */
  spaceBefore: boolean;
}

export interface SendKeysDirective {
  kind: 'sendKeys';
  keys: KeyCombo[];
}

/**
 * One unit of output work for the target window. Batches are delivered in order.
 */
export type InjectionDirective = TypeTextDirective | SendKeysDirective;

export function typeText(text: string, spaceBefore = false): TypeTextDirective {
  return { kind: 'typeText', text, spaceBefore };
}

export function sendKeys(...keys: KeyCombo[]): SendKeysDirective {
  return { kind: 'sendKeys', keys };
}

/**
 * Short human-readable form, e.g. `type "hello"` or `keys ctrl+a Delete`.
 */
export function describeDirective(directive: InjectionDirective): string {
  if (directive.kind === 'typeText') {
    return `type ${JSON.stringify(directive.spaceBefore ? ` ${directive.text}` : directive.text)}`;
  }
  return `keys ${directive.keys.join(' ')}`;
}
