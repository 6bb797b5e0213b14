/**
 * Command-line argument parsing for the coffeepair CLI
 */

export const COMMANDS = ['run', 'preview', 'history', 'serve', 'help'] as const;

export type Command = typeof COMMANDS[number];

export interface CliArgs {
  command: Command;
  // undefined means "use the config value"
  testing?: boolean;
  dryRun: boolean;
  unknown: string[];
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value);
}

/**
 * Parse argv (without node and script path). Unrecognised input is
 * collected in `unknown` so the caller can report it.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  const unknown: string[] = [];

  let command: Command = 'help';
  if (first === undefined || first === '--help' || first === '-h') {
    command = 'help';
  } else if (isCommand(first)) {
    command = first;
  } else {
    unknown.push(first);
  }

  const parsed: CliArgs = { command, dryRun: command === 'preview', unknown };

  for (const arg of rest) {
    switch (arg) {
      case '--testing':
      case '-t':
        parsed.testing = true;
        break;
      case '--no-testing':
        parsed.testing = false;
        break;
      case '--dry-run':
      case '-n':
        parsed.dryRun = true;
        break;
      default:
        unknown.push(arg);
    }
  }

  return parsed;
}

export const USAGE = `
coffeepair - random coffee pairs for a Slack channel

Usage:
  coffeepair run [--testing] [--dry-run]   Pair the channel and post the announcement
  coffeepair preview [--testing]           Print the announcement without posting
  coffeepair history [--testing]           Show pairs parsed from earlier announcements
  coffeepair serve [--testing]             Run rounds on the configured schedule
  coffeepair help                          Show this message

Options:
  -t, --testing     Silent @names, post to the testing channel
      --no-testing  Override testing: true from the config file
  -n, --dry-run     Do everything except posting

Config: ./coffeepair.yaml, ~/.coffeepair/config.yaml or COFFEEPAIR_CONFIG.
The Slack token is read from slack.token, SLACK_BOT_TOKEN or SLACK_API_TOKEN.
`;
