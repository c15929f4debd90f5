import { GRAMMAR, isPrivileged } from '../grammar/keyphrases.js';
import { classify } from '../grammar/matcher.js';
import type { Classification } from '../grammar/types.js';
import { Activation } from '../session/state.js';
import { listCorrections, normalize } from '../text/normalizer.js';

export interface ClassifyReport {
  input: string;
  normalized: string;
  activation: Activation;
  classification: Classification;
}

/**
 * Runs one utterance through normalization and classification, without
 * touching any session state.
 */
export function classifyText(input: string, activation: Activation): ClassifyReport {
  const normalized = normalize(input);
  return {
    input,
    normalized,
    activation,
    classification: classify(normalized, activation),
  };
}

function describeEntry(entry: (typeof GRAMMAR)[number]): string {
  switch (entry.category) {
    case 'selectOption':
      return 'selectOption <1-5>';
    case 'confirm':
      return `confirm ${entry.answer}`;
    default:
      return entry.category;
  }
}

/**
 * Keyphrase table in declaration order, followed by the spoken-text corrections.
 */
export function formatGrammar(): string[] {
  const width = Math.max(...GRAMMAR.map((entry) => entry.phrase.length));
  const lines = ['Keyphrases (earlier rows win ties):'];

  GRAMMAR.forEach((entry, index) => {
    const marker = isPrivileged(entry) ? '*' : ' ';
    lines.push(
      `${String(index + 1).padStart(3)} ${marker} ${entry.phrase.padEnd(width)}  ${describeEntry(entry)}`
    );
  });
  lines.push('  * recognized while sleeping');
  lines.push('');
  lines.push('Corrections:');
  for (const correction of listCorrections()) {
    lines.push(`    ${JSON.stringify(correction.spoken)} -> ${JSON.stringify(correction.written)}`);
  }
  lines.push('    one..five -> 1..5');

  return lines;
}
