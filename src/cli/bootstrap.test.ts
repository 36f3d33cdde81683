import 'reflect-metadata';
import { afterEach, describe, expect, it } from '@jest/globals';
import { ConfigurationError } from '@/common/errors';
import { RotationService } from '@/dataset/rotation.service';
import { createCollectorContext } from './bootstrap';

describe('createCollectorContext', () => {
  const saved = process.env.BATCH_LIMIT;

  afterEach(() => {
    if (saved === undefined) delete process.env.BATCH_LIMIT;
    else process.env.BATCH_LIMIT = saved;
  });

  it('rejects with the configuration error instead of aborting', async () => {
    process.env.BATCH_LIMIT = 'abc';

    const err = await createCollectorContext(false).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty(
      'message',
      'BATCH_LIMIT must be a non-negative integer, got "abc"',
    );
  });

  it('wires the rotation step with valid settings', async () => {
    process.env.BATCH_LIMIT = '10';

    const app = await createCollectorContext(false);
    try {
      expect(app.get(RotationService)).toBeInstanceOf(RotationService);
    } finally {
      await app.close();
    }
  });
});
