/**
 * Serial dispatch queue.
 */

import { SerialQueue } from '../../src/engine/serial-queue';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const log: string[] = [];
    const slow = queue.run(async () => {
      log.push('slow:start');
      await delay(20);
      log.push('slow:end');
      return 1;
    });
    const fast = queue.run(async () => {
      log.push('fast');
      return 2;
    });

    expect(queue.size).toBe(2);
    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
    await queue.drain();
    expect(queue.size).toBe(0);
  });

  it('keeps going after a task rejects', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'after');
    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });
});
