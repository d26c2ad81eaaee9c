import type { ParsedArgs } from './types.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

type PositionalKey = 'tokenUrl' | 'clientId' | 'clientSecret' | 'username' | 'password';

const POSITIONAL_ORDER: readonly PositionalKey[] = ['tokenUrl', 'clientId', 'clientSecret', 'username', 'password'];

const POSITIONALS: Record<PositionalKey, { env: string; label: string }> = {
  tokenUrl: { env: 'OKTAURL', label: 'Identity provider URL' },
  clientId: { env: 'CLIENT_ID', label: 'Client ID' },
  clientSecret: { env: 'CLIENT_SECRET', label: 'Client Secret' },
  username: { env: 'OKTAUSERNAME', label: 'Username' },
  password: { env: 'OKTAPASSWORD', label: 'Password' }
};

export function usage(): string {
  return [
    'Usage:',
    '  transfer-workload [-v] [url] [client_id] [client_secret] [username] [password]',
    '',
    'Fetches an id_token from the identity provider, runs the transfer workload with it,',
    'then with a refreshed id_token and finally with a bogus one.',
    '',
    'Arguments default to OKTAURL, CLIENT_ID, CLIENT_SECRET, OKTAUSERNAME and OKTAPASSWORD.',
    '',
    'Options:',
    '  -v, --verbose  print debug info',
    '  -h, --help     show this message'
  ].join('\n');
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  let verbose = false;
  const positional: string[] = [];

  for (const arg of argv) {
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }

    if (arg === '-v' || arg === '--verbose') {
      verbose = true;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option ${arg}.`);
    }

    positional.push(arg);
  }

  if (positional.length > POSITIONAL_ORDER.length) {
    throw new CliUsageError(`Expected at most ${POSITIONAL_ORDER.length} arguments, got ${positional.length}.`);
  }

  const requireValue = (key: PositionalKey): string => {
    const value = positional[POSITIONAL_ORDER.indexOf(key)] ?? env[POSITIONALS[key].env];
    if (!value) {
      throw new CliUsageError(`${POSITIONALS[key].label} is not set`);
    }
    return value;
  };

  // Checked in this order so the first missing credential is reported first.
  const clientId = requireValue('clientId');
  const clientSecret = requireValue('clientSecret');
  const username = requireValue('username');
  const password = requireValue('password');
  const tokenUrl = requireValue('tokenUrl');

  return { kind: 'run', verbose, tokenUrl, clientId, clientSecret, username, password };
}
