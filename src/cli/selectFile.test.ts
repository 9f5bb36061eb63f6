import { describe, expect, it, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline/promises';
import { formatMenu, parseChoice, promptChoice } from './selectFile';

describe('file menu', () => {
  it('numbers files from one and offers exit as zero', () => {
    expect(formatMenu(['data/1_sleep.txt', 'data/2_diet.txt'])).toBe(
      'TOPIC FILE SELECTOR\n\nAvailable topic files:\n\n  [1] 1_sleep.txt\n  [2] 2_diet.txt\n\n  [0] Exit\n'
    );
  });

  it('accepts numbers within range only', () => {
    expect(parseChoice(' 2 ', 2)).toBe(2);
    expect(parseChoice('0', 2)).toBe(0);
    expect(parseChoice('3', 2)).toBeNull();
    expect(parseChoice('-1', 2)).toBeNull();
    expect(parseChoice('two', 2)).toBeNull();
  });

  it('hands Ctrl-C at the prompt to the interrupt handler', async () => {
    const input = new PassThrough();
    const rl = createInterface({ input, output: new PassThrough() });
    const onInterrupt = vi.fn();

    const choice = promptChoice(rl, 2, onInterrupt);
    rl.emit('SIGINT');
    expect(onInterrupt).toHaveBeenCalledOnce();

    input.write('2\n');
    await expect(choice).resolves.toBe(2);
    rl.close();
  });
});
