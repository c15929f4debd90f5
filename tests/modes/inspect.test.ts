import { describe, expect, it } from 'vitest';
import { classifyText, formatGrammar } from '../../src/modes/inspect.js';
import { Activation } from '../../src/session/state.js';

describe('classifyText', () => {
  it('reports the normalized text and classification', () => {
    expect(classifyText('select option three', Activation.ACTIVE)).toEqual({
      input: 'select option three',
      normalized: 'select option 3',
      activation: Activation.ACTIVE,
      classification: { kind: 'control', category: 'selectOption', phrase: 'select option', option: 3 },
    });
  });

  it('classifies as sleeping by the given state', () => {
    expect(classifyText('send this prompt', Activation.SLEEPING).classification).toEqual({
      kind: 'literal',
      text: 'send this prompt',
    });
  });
});

describe('formatGrammar', () => {
  it('lists keyphrases with wake phrases marked', () => {
    const lines = formatGrammar();

    expect(lines[0]).toBe('Keyphrases (earlier rows win ties):');
    expect(lines[1]).toBe('  1 * activate voice commander    activate');
    expect(lines[3]).toBe('  3 * deactivate voice commander  deactivate');
    expect(lines[5]).toBe('  5   send this prompt            finalize');
    expect(lines[11]).toBe(' 11   select option               selectOption <1-5>');
    expect(lines[18]).toBe(' 18   answer help                 confirm help');
    expect(lines[19]).toBe('  * recognized while sleeping');
  });

  it('lists corrections after the keyphrases', () => {
    const lines = formatGrammar();

    expect(lines.slice(20, 23)).toEqual(['', 'Corrections:', '    "cloud code" -> "claude code"']);
    expect(lines[lines.length - 1]).toBe('    one..five -> 1..5');
    expect(lines).toHaveLength(32);
  });
});
