export type CliOptions = {
  configFile: string;
  stanza: string;
};

export type CliParseResult = { kind: 'run'; options: CliOptions } | { kind: 'help' } | { kind: 'error'; message: string };

export const USAGE = `Usage: jira-comments -c <config_file> [-s <stanza>]

Retrieves the comments of the Jira issues selected by a JQL query and writes
them to STDOUT, one JSON object per line.

  -c, --config_file  Path (or http(s)://, s3:// URL) of the configuration file
  -s, --stanza       Stanza of the configuration file describing the source Jira
                     instance. Default: "source"
  -h, --help         Show this help`;

/**
 * Lecture des arguments : `-c x`, `--config_file x`, `--config_file=x` (idem pour le stanza).
 */
export function parseArgs(argv: string[]): CliParseResult {
  let configFile: string | null = null;
  let stanza = 'source';

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (flag !== '-c' && flag !== '--config_file' && flag !== '-s' && flag !== '--stanza') {
      return { kind: 'error', message: `Unknown argument: ${arg}` };
    }

    let value = eq === -1 ? undefined : arg.slice(eq + 1);
    if (value === undefined) {
      value = argv[index + 1];
      index += 1;
    }
    if (value === undefined || value.trim() === '') {
      return { kind: 'error', message: `Missing value for ${flag}` };
    }

    if (flag === '-c' || flag === '--config_file') {
      configFile = value.trim();
    } else {
      stanza = value.trim();
    }
  }

  if (!configFile) {
    return { kind: 'error', message: 'the following arguments are required: -c/--config_file' };
  }
  return { kind: 'run', options: { configFile, stanza } };
}
