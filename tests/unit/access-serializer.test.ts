import { describe, expect, it } from 'vitest';

import { AccessSerializer } from '../../src/inference/access-serializer.js';
import { ERROR_CODES, isCadenceError } from '../../src/errors/cadence-error.js';

describe('AccessSerializer', () => {
  it('hands out access first in, first out', async () => {
    const serializer = new AccessSerializer();
    const order: number[] = [];

    const release1 = await serializer.acquire();
    const second = serializer.acquire().then((release) => {
      order.push(2);
      return release;
    });
    const third = serializer.acquire().then((release) => {
      order.push(3);
      return release;
    });
    expect(serializer.pending).toBe(2);
    expect(serializer.busy).toBe(true);

    release1();
    const release2 = await second;
    expect(order).toEqual([2]);

    release2();
    const release3 = await third;
    expect(order).toEqual([2, 3]);

    release3();
    expect(serializer.busy).toBe(false);
    expect(serializer.pending).toBe(0);
  });

  it('ignores repeated release calls', async () => {
    const serializer = new AccessSerializer();
    const release1 = await serializer.acquire();
    const second = serializer.acquire();

    release1();
    release1();
    const release2 = await second;
    expect(serializer.busy).toBe(true);

    release2();
    expect(serializer.busy).toBe(false);
  });

  it('rejects while busy under the reject policy', async () => {
    const serializer = new AccessSerializer('reject');
    const release = await serializer.acquire();

    let caught: unknown;
    try {
      await serializer.acquire();
    } catch (error) {
      caught = error;
    }
    expect(isCadenceError(caught, ERROR_CODES.GENERATION_BUSY)).toBe(true);
    expect(isCadenceError(caught) && caught.message).toBe('Generation already in progress');

    release();
    const again = await serializer.acquire();
    again();
    expect(serializer.busy).toBe(false);
  });

  it('releases after run() even when the task throws', async () => {
    const serializer = new AccessSerializer();
    await expect(serializer.run(async () => 42)).resolves.toBe(42);
    await expect(
      serializer.run(async () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    expect(serializer.busy).toBe(false);
  });
});
