#!/usr/bin/env node
import { DEFAULT_POSTCARD_CONFIG, loadSettings } from './config';
import { describeError } from './errors';
import { componentLogger } from './logger';
import { BatchRunner } from './services/batch/batchRunner';
import { PostcardComposer } from './services/postcard/postcardComposer';

const log = componentLogger('Batch');

async function bootstrap() {
  const settings = loadSettings(process.argv.slice(2));
  const config = DEFAULT_POSTCARD_CONFIG;

  const composer = new PostcardComposer({ config });
  const batch = new BatchRunner({ config, composer });

  log.info(`${settings.inputDir} -> ${settings.outputDir}`);
  const summary = await batch.run(settings.inputDir, settings.outputDir);
  if (summary.failed > 0) {
    log.warn(`${summary.failed} photo(s) failed, see the errors above`);
  }
}

bootstrap().catch((error) => {
  log.error(describeError(error));
  process.exit(1);
});
