// --- CLI Arg Types ---

/** Raw option values as given on the command line; validated by loadConfig. */
export interface CliOptions {
  pdfPath?: string;
  token?: string;
  orgId?: string;
  env?: string;
  linkpageName?: string;
  qrName?: string;
  mediaFolder?: string;
  outputDir?: string;
  timeoutMs?: string;
  maxAttempts?: string;
  qrFormat?: string;
  qrSize?: string;
  deleteAfter: boolean;
  verbose: boolean;
  jsonLogs: boolean;
}

export interface RunArgs {
  command: 'run';
  options: CliOptions;
}

export interface HelpArgs {
  command: 'help';
}

export type ParsedArgs = RunArgs | HelpArgs;

/** Malformed command line. The CLI prints usage and exits with code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// --- Constants ---

type ValueOption = Exclude<keyof CliOptions, 'deleteAfter' | 'verbose' | 'jsonLogs'>;
type SwitchOption = 'deleteAfter' | 'verbose' | 'jsonLogs';

const VALUE_FLAGS = new Map<string, ValueOption>([
  ['--pdf-path', 'pdfPath'],
  ['--token', 'token'],
  ['--org-id', 'orgId'],
  ['--env', 'env'],
  ['--linkpage-name', 'linkpageName'],
  ['--qr-name', 'qrName'],
  ['--media-folder', 'mediaFolder'],
  ['--output-dir', 'outputDir'],
  ['--timeout-ms', 'timeoutMs'],
  ['--max-attempts', 'maxAttempts'],
  ['--qr-format', 'qrFormat'],
  ['--qr-size', 'qrSize'],
]);

const SWITCH_FLAGS = new Map<string, SwitchOption>([
  ['--delete-after', 'deleteAfter'],
  ['--verbose', 'verbose'],
  ['--json-logs', 'jsonLogs'],
]);

export const USAGE = [
  'Usage:',
  '  linkpage-pdf-flow --pdf-path <file> [options]',
  '',
  'Options:',
  '  --pdf-path <file>       PDF to publish (required)',
  '  --token <token>         API token (or UNIQODE_TOKEN)',
  '  --org-id <id>           Organization id (or UNIQODE_ORG_ID)',
  '  --env <qa|prod>         Target environment (or UNIQODE_ENV, default qa)',
  '  --linkpage-name <name>  Name of the new linkpage',
  '  --qr-name <name>        Name of the new QR code',
  '  --media-folder <id>     Media folder for the upload',
  '  --delete-after          Remove the PDF widget again after adding it',
  '  --output-dir <dir>      Where the QR image and flow_results.json go (default .)',
  '  --timeout-ms <n>        Per-request timeout (default 30000)',
  '  --max-attempts <n>      Attempts for read-only steps (default 1)',
  '  --qr-format <pdf|png|svg>  QR image format (default pdf)',
  '  --qr-size <px>          QR image size (default 1024)',
  '  --verbose               Debug logging',
  '  --json-logs             Log JSON lines instead of text',
  '  --help                  Show this help',
].join('\n');

// --- CLI Parsing ---

/** Parse `process.argv`-shaped input (the first two entries are skipped). */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const options: CliOptions = { deleteAfter: false, verbose: false, jsonLogs: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      return { command: 'help' };
    }

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
    const inlineValue = flag !== arg ? arg.slice(eq + 1) : undefined;

    const switchOption = SWITCH_FLAGS.get(flag);
    if (switchOption) {
      if (inlineValue !== undefined) {
        throw new UsageError(`${flag} does not take a value`);
      }
      options[switchOption] = true;
      continue;
    }

    const valueOption = VALUE_FLAGS.get(flag);
    if (valueOption) {
      let value = inlineValue;
      if (value === undefined) {
        const next = args[i + 1];
        if (next === undefined || next.startsWith('--')) {
          throw new UsageError(`${flag} requires a value`);
        }
        value = next;
        i++;
      }
      options[valueOption] = value;
      continue;
    }

    throw new UsageError(`Unknown argument "${arg}"`);
  }

  return { command: 'run', options };
}
