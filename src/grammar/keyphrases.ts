import type { ControlCategory, GrammarEntry } from './types.js';

/**
 * Keyphrase grammar, in declaration order.
 *
 * Phrases are written against normalized text: number words are already digits
 * and corrections already applied, so nothing here may contain "one".."five".
 * Activation phrases are reserved words and must not share a token run with any
 * other entry.
 */
export const GRAMMAR: ReadonlyArray<Readonly<GrammarEntry>> = [
  { phrase: 'activate voice commander', category: 'activate' },
  { phrase: 'start voice commander', category: 'activate' },
  { phrase: 'deactivate voice commander', category: 'deactivate' },
  { phrase: 'stop voice commander', category: 'deactivate' },

  { phrase: 'send this prompt', category: 'finalize' },
  { phrase: 'send prompt', category: 'finalize' },

  { phrase: 'remove last word', category: 'removeWord' },
  { phrase: 'remove this line', category: 'clearLine' },
  { phrase: 'remove complete input', category: 'clearLine' },
  { phrase: 'start over', category: 'clearAll' },

  // The option digit must be the token right after the phrase.
  { phrase: 'select option', category: 'selectOption' },
  { phrase: 'choose option', category: 'selectOption' },

  { phrase: 'change operation mode', category: 'modeSwitch' },
  { phrase: 'cycle mode', category: 'modeSwitch' },

  { phrase: 'answer yes', category: 'confirm', answer: 'yes' },
  { phrase: 'answer no', category: 'confirm', answer: 'no' },
  { phrase: 'answer quit', category: 'confirm', answer: 'quit' },
  { phrase: 'answer help', category: 'confirm', answer: 'help' },
];

/**
 * Categories recognized in every activation state.
 */
export const PRIVILEGED_CATEGORIES: ReadonlySet<ControlCategory> = new Set<ControlCategory>([
  'activate',
  'deactivate',
]);

export function isPrivileged(entry: Readonly<GrammarEntry>): boolean {
  return PRIVILEGED_CATEGORIES.has(entry.category);
}
