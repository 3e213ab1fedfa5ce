#!/usr/bin/env node
import { HELP_TEXT, parseCliArgs, type CliResult } from './cli.js';

let cli: CliResult;
try {
  cli = parseCliArgs(process.argv.slice(2));
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  console.error(HELP_TEXT);
  process.exit(1);
}

if (cli.help) {
  console.log(HELP_TEXT);
  process.exit(0);
}

// Flags must be in the environment before the logger reads LOG_LEVEL.
Object.assign(process.env, cli.env);

const [{ run }, { logger }, { ProxyError }] = await Promise.all([
  import('./app.js'),
  import('./lib/logger.js'),
  import('./lib/errors.js'),
]);

try {
  await run(process.env);
} catch (error) {
  if (error instanceof ProxyError) {
    logger.fatal({ code: error.code }, error.message);
  } else {
    logger.fatal({ err: error }, 'startup_failed');
  }
  process.exit(1);
}
