import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import pino from 'pino';
import { run } from '../../src/index.js';
import { processOrder } from './handler.js';

const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

run(processOrder, {
  log,
  handlerDir: dirname(fileURLToPath(import.meta.url)),
}).catch((err: unknown) => {
  log.fatal({ err }, 'Order processor failed');
  process.exitCode = 1;
});
