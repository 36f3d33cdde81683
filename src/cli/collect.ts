#!/usr/bin/env node
import 'reflect-metadata';
import './register-paths';
import { CollectService } from '@/collect/collect.service';
import { ConfigurationError } from '@/common/errors';
import { RotationService } from '@/dataset/rotation.service';
import { toFetchRequest } from '@/sampling/dto/fetch-request.dto';
import { parseCliArgs, USAGE } from './args';
import { createCollectorContext } from './bootstrap';

(async () => {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.mode === 'help') {
    console.log(USAGE);
    return;
  }

  const app = await createCollectorContext();

  try {
    if (options.mode === 'rotate') {
      const outcome = await app.get(RotationService).rotate();
      console.log(JSON.stringify({ mode: 'rotate', ...outcome }, null, 2));
      return;
    }

    const request = await toFetchRequest(options.request);
    const summary = await app.get(CollectService).run(request, {
      batchLimit: options.batchLimit,
    });
    console.log(JSON.stringify({ mode: options.mode, ...summary }, null, 2));
  } finally {
    await app.close();
  }
})().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`${err.message}\n\n${USAGE}`);
    process.exit(2);
  }
  console.error('Fatal error in CLI:', err);
  process.exit(1);
});
