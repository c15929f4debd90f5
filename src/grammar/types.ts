/**
 * Control categories a spoken keyphrase can map to.
 */
export type ControlCategory =
  | 'activate'
  | 'deactivate'
  | 'finalize'
  | 'removeWord'
  | 'clearLine'
  | 'clearAll'
  | 'selectOption'
  | 'modeSwitch'
  | 'confirm';

export type ConfirmAnswer = 'yes' | 'no' | 'quit' | 'help';

export type OptionNumber = 1 | 2 | 3 | 4 | 5;

interface ControlBase {
  kind: 'control';
  /** The grammar phrase that matched, in its table spelling. */
  phrase: string;
}

export interface SimpleControl extends ControlBase {
  category: Exclude<ControlCategory, 'selectOption' | 'confirm'>;
}

export interface SelectOptionControl extends ControlBase {
  category: 'selectOption';
  option: OptionNumber;
}

export interface ConfirmControl extends ControlBase {
  category: 'confirm';
  answer: ConfirmAnswer;
}

export type ControlClassification = SimpleControl | SelectOptionControl | ConfirmControl;

export interface LiteralClassification {
  kind: 'literal';
  text: string;
}

/**
 * Result of matching one normalized fragment against the grammar.
 */
export type Classification = LiteralClassification | ControlClassification;

/**
 * One row of the keyphrase grammar. Row order is significant: it breaks ties
 * between phrases of equal length.
 */
export type GrammarEntry =
  | { phrase: string; category: SimpleControl['category'] }
  | { phrase: string; category: 'selectOption' }
  | { phrase: string; category: 'confirm'; answer: ConfirmAnswer };
