import 'dotenv/config';
import { createApp } from './app.js';
import { BGN_PER_EUR } from '../services/conversion/index.js';
import { logger } from '../infrastructure/logger.js';

const PORT = parseInt(process.env.PORT ?? '3000', 10);

function main(): void {
  const app = createApp();

  app.listen(PORT, () => {
    logger.info({ port: PORT, bgnPerEur: BGN_PER_EUR.quotePerBase.toString() }, 'BGN/EUR verifier API started');
  });
}

try {
  main();
} catch (err) {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
}
