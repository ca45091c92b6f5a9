import { TargetLock } from '../../src/generations/target-lock';
import { deferred } from '../helpers/fakes';

describe('TargetLock', () => {
  test('runs holders one at a time in call order', async () => {
    const lock = new TargetLock('web-1');
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run(async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(lock.locked).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.locked).toBe(false);
  });

  test('a failed holder does not block the next one', async () => {
    const lock = new TargetLock('web-1');
    const failed = lock.run(async () => {
      throw new Error('write failed');
    });
    const next = lock.run(async () => 'ran');

    await expect(failed).rejects.toThrow('write failed');
    await expect(next).resolves.toBe('ran');
  });
});
