import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import type { Fragment } from '../../src/engine/types.js';
import { type SourceCommand, StdinFragmentSource } from '../../src/stt/stdinSource.js';

describe('StdinFragmentSource', () => {
  it('splits lines into fragments and commands', async () => {
    const input = new PassThrough();
    const source = new StdinFragmentSource(input, () => 1000);
    const fragments: Fragment[] = [];
    const commands: SourceCommand[] = [];
    const unknown: string[] = [];
    source.onFragment((fragment) => fragments.push(fragment));
    source.onCommand((command) => commands.push(command));
    source.onUnknownCommand((line) => unknown.push(line));

    const done = source.start();
    input.write('  create a function \n');
    input.write('\n');
    input.write(':status\n');
    input.write(': Quit\n');
    input.write(':bogus\n');
    input.end();
    await done;

    expect(fragments).toEqual([{ text: 'create a function', confidence: 1, timestamp: 1000 }]);
    expect(commands).toEqual(['status', 'quit']);
    expect(unknown).toEqual([':bogus']);
  });

  it('resolves when closed', async () => {
    const source = new StdinFragmentSource(new PassThrough());
    const done = source.start();

    source.close();

    await expect(done).resolves.toBeUndefined();
  });
});
