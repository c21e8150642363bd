import { OutputBuffer } from '../output-buffer.js';
import { SerialQueue } from '../serial-queue.js';

describe('OutputBuffer', () => {
  test('should keep the head and drop the rest once full', () => {
    const buffer = new OutputBuffer(5, 'head');
    buffer.append('abc');
    expect(buffer.truncated).toBe(false);

    buffer.append(Buffer.from('defg'));
    buffer.append('h');

    expect(buffer.toString()).toBe('abcde');
    expect(buffer.byteLength).toBe(5);
    expect(buffer.truncated).toBe(true);
  });

  test('should keep the tail and drop the oldest bytes', () => {
    const buffer = new OutputBuffer(5, 'tail');
    buffer.append('abc');
    buffer.append('defg');

    expect(buffer.toString()).toBe('cdefg');
    expect(buffer.truncated).toBe(true);
  });

  test('should empty itself and reset the flag on drain', () => {
    const buffer = new OutputBuffer(3, 'tail');
    buffer.append('abcd');

    expect(buffer.drain()).toEqual({ text: 'bcd', truncated: true });
    expect(buffer.drain()).toEqual({ text: '', truncated: false });
  });
});

describe('SerialQueue', () => {
  test('should run tasks one at a time in order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (label: string, delay: number) => () => new Promise<string>((resolve) => {
      events.push(`start ${label}`);
      setTimeout(() => {
        events.push(`end ${label}`);
        resolve(label);
      }, delay);
    });

    const results = await Promise.all([queue.run(task('a', 20)), queue.run(task('b', 0))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  test('should keep going after a failed task', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(() => Promise.reject(new Error('boom')));
    const next = queue.run(() => Promise.resolve('ok'));

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
