import { describe, it, expect } from 'vitest';
import { abortable } from './abortable.js';

describe('abortable', () => {
  it('settles with the wrapped promise', async () => {
    const controller = new AbortController();

    await expect(abortable(Promise.resolve('done'), controller.signal)).resolves.toBe('done');
    await expect(abortable(Promise.reject(new Error('boom')), controller.signal)).rejects.toThrow('boom');
  });

  it('rejects with the abort reason while the promise is pending', async () => {
    const controller = new AbortController();
    const never = new Promise<string>(() => undefined);
    const raced = abortable(never, controller.signal);

    controller.abort(new Error('stop'));

    await expect(raced).rejects.toThrow('stop');
  });

  it('rejects at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('early'));

    await expect(abortable(Promise.reject(new Error('late')), controller.signal)).rejects.toThrow('early');
  });
});
