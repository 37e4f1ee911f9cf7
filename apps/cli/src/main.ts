import 'dotenv/config';
import { runCli } from './cli.js';

runCli(process.argv.slice(2)).catch((err: unknown) => {
  console.error('[cli]', err instanceof Error ? err.message : err);
  process.exit(1);
});
