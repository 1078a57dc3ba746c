import { USAGE, runCli } from './run';

runCli(process.argv.slice(2)).catch((error) => {
  console.error('[cli] prediction failed', error instanceof Error ? error.message : error);
  console.error(USAGE);
  process.exit(1);
});
