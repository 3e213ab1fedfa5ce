import { parseArgs } from 'node:util';

export const HELP_TEXT = `Usage: chamber-proxy [options]

Fan a printer's camera stream out to many clients over a single printer connection.

Options:
  -p, --printer-ip <ip>      printer address (PRINTER_IP)
  -a, --access-code <code>   printer access code (ACCESS_CODE)
  -b, --bind <address>       address the proxy listens on (BIND_ADDRESS, default 0.0.0.0)
  -v, --verbose              debug logging (LOG_LEVEL=debug)
  -h, --help                 show this help

Every other setting is read from the environment or a .env file.`;

export interface CliResult {
  help: boolean;
  env: Record<string, string>;
}

/** Turns command-line flags into the environment keys they override. */
export function parseCliArgs(argv: string[]): CliResult {
  const { values } = parseArgs({
    args: argv,
    options: {
      'printer-ip': { type: 'string', short: 'p' },
      'access-code': { type: 'string', short: 'a' },
      bind: { type: 'string', short: 'b' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  const env: Record<string, string> = {};
  if (values['printer-ip'] !== undefined) env.PRINTER_IP = values['printer-ip'];
  if (values['access-code'] !== undefined) env.ACCESS_CODE = values['access-code'];
  if (values.bind !== undefined) env.BIND_ADDRESS = values.bind;
  if (values.verbose) env.LOG_LEVEL = 'debug';

  return { help: values.help ?? false, env };
}
