import { ConfigError } from './errorHandler';

export interface CliOptions {
  username?: string;
  profile?: string;
  silent: boolean;
  help: boolean;
  version: boolean;
}

export const USAGE = `
Usage: extract-profile [username] [profile] [options]

Extract complete Hypixel SkyBlock profile data for AI analysis

ARGUMENTS:
  username                 Minecraft username to extract data for
  profile                  Profile name to extract (e.g. Apple)

OPTIONS:
  -p, --profile <name>     Profile name to extract
  -s, --silent             Run without prompts or progress output
  -v, --version            Show the version
  -h, --help               Show this help message

ENVIRONMENT (.env.local or .env):
  HYPIXEL_API_KEY          API key (otherwise read from API_KEY_FILE)
  API_KEY_FILE             Key file, default api_key.txt
  OUTPUT_ROOT              Where run directories are created, default .
  REQUEST_DELAY_MS         Delay after every request, default 500
  REQUEST_TIMEOUT_MS       Request timeout, default 30000
  MAX_ATTEMPTS             Attempts per request, default 3
`;

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { silent: false, help: false, version: false };
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-s':
      case '--silent':
        options.silent = true;
        break;

      case '-h':
      case '--help':
        options.help = true;
        break;

      case '-v':
      case '--version':
        options.version = true;
        break;

      case '-p':
      case '--profile': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('-')) {
          throw new ConfigError(`${arg} requires a profile name`);
        }
        options.profile = value;
        i++;
        break;
      }

      default:
        if (arg.startsWith('--profile=')) {
          options.profile = arg.slice('--profile='.length);
        } else if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        } else {
          positionals.push(arg);
        }
    }
  }

  if (positionals.length > 2) {
    throw new ConfigError(`Unexpected argument: ${positionals[2]}`);
  }

  const [username, profile] = positionals;
  if (username) options.username = username;
  if (profile && !options.profile) options.profile = profile;

  return options;
}
