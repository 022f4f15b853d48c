// Environment first, before anything reads process.env
import { createLogger, initEnv } from '@wearable/config';
import { runLoader } from './loader.js';

initEnv();

const logger = createLogger('loader');

runLoader(process.argv.slice(2), { logger })
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.fatal({ error: error instanceof Error ? error.message : String(error) }, '❌ Loader crashed');
    process.exit(1);
  });
