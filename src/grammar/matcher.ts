import { Activation } from '../session/state.js';
import { GRAMMAR, isPrivileged } from './keyphrases.js';
import type {
  Classification,
  ControlClassification,
  GrammarEntry,
  OptionNumber,
} from './types.js';

interface CompiledEntry {
  entry: Readonly<GrammarEntry>;
  order: number;
  tokens: string[];
}

interface Candidate {
  compiled: CompiledEntry;
  option?: OptionNumber;
}

const EDGE_PUNCTUATION = /^[.,!?;:"']+|[.,!?;:"']+$/g;

/**
 * Splits text into lower-case match tokens, with punctuation stripped from
 * token edges. Used for matching only; literal output keeps the original text.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((token) => token.replace(EDGE_PUNCTUATION, ''))
    .filter((token) => token.length > 0);
}

const compiled: CompiledEntry[] = GRAMMAR.map((entry, order) => ({
  entry,
  order,
  tokens: tokenize(entry.phrase),
}));

const privilegedEntries = compiled.filter((c) => isPrivileged(c.entry));
const commandEntries = compiled.filter((c) => !isPrivileged(c.entry));

function parseOption(token: string | undefined): OptionNumber | undefined {
  switch (token) {
    case '1':
      return 1;
    case '2':
      return 2;
    case '3':
      return 3;
    case '4':
      return 4;
    case '5':
      return 5;
    default:
      return undefined;
  }
}

/**
 * Finds the first occurrence of the entry's token run that satisfies the entry.
 * Option entries only count when a digit 1..5 follows the phrase directly.
 */
function matchEntry(c: CompiledEntry, tokens: string[]): Candidate | undefined {
  const width = c.tokens.length;

  for (let start = 0; start + width <= tokens.length; start++) {
    let hit = true;
    for (let i = 0; i < width; i++) {
      if (tokens[start + i] !== c.tokens[i]) {
        hit = false;
        break;
      }
    }
    if (!hit) {
      continue;
    }

    if (c.entry.category !== 'selectOption') {
      return { compiled: c };
    }

    const option = parseOption(tokens[start + width]);
    if (option !== undefined) {
      return { compiled: c, option };
    }
  }

  return undefined;
}

/**
 * Longest phrase wins; on equal length the earlier grammar row wins.
 */
function bestOf(entries: CompiledEntry[], tokens: string[]): Candidate | undefined {
  let best: Candidate | undefined;

  for (const c of entries) {
    const candidate = matchEntry(c, tokens);
    if (!candidate) {
      continue;
    }
    if (
      !best ||
      c.entry.phrase.length > best.compiled.entry.phrase.length ||
      (c.entry.phrase.length === best.compiled.entry.phrase.length &&
        c.order < best.compiled.order)
    ) {
      best = candidate;
    }
  }

  return best;
}

function toControl(candidate: Candidate): ControlClassification | undefined {
  const { entry } = candidate.compiled;

  switch (entry.category) {
    case 'selectOption':
      return candidate.option === undefined
        ? undefined
        : { kind: 'control', category: 'selectOption', phrase: entry.phrase, option: candidate.option };
    case 'confirm':
      return { kind: 'control', category: 'confirm', phrase: entry.phrase, answer: entry.answer };
    default:
      return { kind: 'control', category: entry.category, phrase: entry.phrase };
  }
}

/**
 * Classifies a normalized fragment against the keyphrase grammar.
 *
 * Activation and deactivation phrases are recognized in every state and take
 * priority over everything else. Other commands are recognized only while
 * ACTIVE; while SLEEPING anything that is not a wake phrase is literal, and it is
 * the state machine that discards it.
 */
export function classify(normalizedText: string, activation: Activation): Classification {
  const tokens = tokenize(normalizedText);

  const candidate =
    bestOf(privilegedEntries, tokens) ??
    (activation === Activation.ACTIVE ? bestOf(commandEntries, tokens) : undefined);

  const control = candidate ? toControl(candidate) : undefined;
  return control ?? { kind: 'literal', text: normalizedText };
}
