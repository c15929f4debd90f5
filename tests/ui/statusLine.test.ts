import { Writable } from 'stream';
import { describe, expect, it } from 'vitest';
import { InjectionTimeoutError, KeystrokeFailedError, TargetLostError } from '../../src/inject/errors.js';
import { Activation } from '../../src/session/state.js';
import { StatusLine, describeFeedback } from '../../src/ui/statusLine.js';

describe('describeFeedback', () => {
  it('describes state changes', () => {
    expect(describeFeedback({ type: 'activated' })).toEqual({ level: 'info', text: '🟢 Voice Commander activated' });
    expect(describeFeedback({ type: 'deactivated', discarded: '' }).text).toBe('💤 Voice Commander deactivated');
    expect(describeFeedback({ type: 'deactivated', discarded: 'half done' }).text).toBe(
      '💤 Voice Commander deactivated (discarded "half done")'
    );
    expect(describeFeedback({ type: 'accumulating', text: 'b', buffer: 'a b' }).text).toBe('📝 accumulating: a b');
    expect(describeFeedback({ type: 'finalized', sent: 'a b' }).text).toBe('📨 Sent (Enter pressed)');
  });

  it('describes edits and shortcuts', () => {
    expect(describeFeedback({ type: 'edited', edit: 'removeWord', buffer: 'write a' }).text).toBe(
      '✂️  Removed last word: write a'
    );
    expect(describeFeedback({ type: 'edited', edit: 'clearLine', buffer: '' }).text).toBe('🧹 Cleared line');
    expect(describeFeedback({ type: 'edited', edit: 'clearAll', buffer: '' }).text).toBe('🧹 Started over');
    expect(describeFeedback({ type: 'optionSelected', option: 4 }).text).toBe('🔢 Selected option 4');
    expect(describeFeedback({ type: 'modeSwitched' }).text).toBe('🔁 Changed operation mode');
    expect(describeFeedback({ type: 'confirmed', answer: 'quit' }).text).toBe('✅ Answered quit');
  });

  it('describes failures', () => {
    expect(
      describeFeedback({ type: 'dispatchFailed', delivered: 1, total: 2, error: new TargetLostError('42') })
    ).toEqual({
      level: 'error',
      text: '❌ error: target lost (1/2 delivered). Type :recapture to pick the window again.',
    });
    expect(
      describeFeedback({ type: 'dispatchFailed', delivered: 0, total: 1, error: new InjectionTimeoutError(5000) }).text
    ).toBe('⏱️  error: Keystroke delivery timed out after 5000ms (0/1 delivered)');
    expect(
      describeFeedback({
        type: 'dispatchFailed',
        delivered: 0,
        total: 1,
        error: new KeystrokeFailedError(new Error('xdotool key failed: exit code 1')),
      }).text
    ).toBe('❌ error: Keystroke delivery failed: xdotool key failed: exit code 1 (0/1 delivered)');
  });

  it('describes refused fragments', () => {
    expect(describeFeedback({ type: 'overflow', text: 'late words', capacity: 32 })).toEqual({
      level: 'warn',
      text: '⚠️  Queue full (32 waiting), dropped "late words"',
    });
    expect(describeFeedback({ type: 'outOfOrder', text: 'old', timestamp: 1, lastTimestamp: 2 }).text).toBe(
      '⚠️  Out-of-order fragment dropped: "old"'
    );
    expect(describeFeedback({ type: 'invalidTimestamp', text: 'odd', timestamp: Number.NaN })).toEqual({
      level: 'warn',
      text: '⚠️  Fragment without a valid timestamp dropped: "odd"',
    });
  });

  it('marks routine events as debug', () => {
    expect(describeFeedback({ type: 'ignored', text: 'hello', activation: Activation.SLEEPING })).toEqual({
      level: 'debug',
      text: '💤 Ignored (SLEEPING): "hello"',
    });
    expect(describeFeedback({ type: 'dispatched', delivered: 1, directives: [] }).level).toBe('debug');
  });

  it('names the new target', () => {
    expect(describeFeedback({ type: 'retargeted', target: { id: '9', name: 'zsh' } }).text).toBe(
      '🎯 Target window: zsh'
    );
    expect(describeFeedback({ type: 'retargeted', target: { id: '9' } }).text).toBe('🎯 Target window: 9');
  });
});

describe('StatusLine', () => {
  // Cursor control sequences are left out; only the visible text is kept.
  function capture() {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        const text = chunk.toString();
        if (!text.startsWith('\x1b')) {
          chunks.push(text);
        }
        callback();
      },
    });
    return { chunks, output };
  }

  it('keeps the partial transcript below printed lines', () => {
    const { chunks, output } = capture();
    const status = new StatusLine(output);

    status.showPartial('crea');
    status.print('hello');

    expect(chunks).toEqual(['💬 crea', 'hello\n', '💬 crea']);
  });

  it('drops the partial once its text is accumulated', () => {
    const { chunks, output } = capture();
    const status = new StatusLine(output);

    status.showPartial('crea');
    status.render({ type: 'accumulating', text: 'create', buffer: 'create' });

    expect(chunks).toEqual(['💬 crea', '📝 accumulating: create\n']);
  });

  it('hides debug events unless asked', () => {
    const quiet = capture();
    new StatusLine(quiet.output).render({ type: 'ignored', text: 'x', activation: Activation.SLEEPING });
    expect(quiet.chunks).toEqual([]);

    const verbose = capture();
    new StatusLine(verbose.output, true).render({ type: 'ignored', text: 'x', activation: Activation.SLEEPING });
    expect(verbose.chunks).toEqual(['💤 Ignored (SLEEPING): "x"\n']);
  });
});
