import { describeAutomaton } from './commands/describe';
import { verifySequence } from './commands/verify';
import { stepSession } from './commands/step';
import { resetSession } from './commands/reset';
import { showHistory } from './commands/history';
import { validateDefinition } from './commands/validate';
import { listExamples } from './commands/examples';
import { splitSymbols } from './format';

export interface CliOptions {
  definition?: string;
  limit?: number;
  positional: string[];
}

export function parseCliOptions(args: string[]): CliOptions {
  const options: CliOptions = { positional: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--definition' || arg === '-d') {
      options.definition = args[++i];
    } else if (arg.startsWith('--definition=')) {
      options.definition = arg.slice('--definition='.length);
    } else if (arg === '--limit' || arg === '-n') {
      options.limit = parseLimit(args[++i]);
    } else if (arg.startsWith('--limit=')) {
      options.limit = parseLimit(arg.slice('--limit='.length));
    } else {
      options.positional.push(arg);
    }
  }

  return options;
}

function parseLimit(value: string | undefined): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid --limit value: ${value ?? '(missing)'}`);
  }
  return limit;
}

export async function runHandshakeCli(args: string[], cwd: string = process.cwd()): Promise<number> {
  const command = args[0] ?? 'help';

  try {
    const options = parseCliOptions(args.slice(1));

    switch (command) {
      case 'describe':
        return await describeAutomaton(cwd, options.definition);

      case 'verify':
        return await verifySequence(cwd, splitSymbols(options.positional), options.definition);

      case 'step':
        return await stepSession(cwd, options.positional[0], options.definition);

      case 'reset':
        return await resetSession(cwd, options.definition);

      case 'history':
        return await showHistory(cwd, { limit: options.limit, definitionPath: options.definition });

      case 'validate':
        return await validateDefinition(cwd, options.positional[0] ?? options.definition);

      case 'examples':
        return await listExamples(cwd, options.definition);

      case 'help':
      case '--help':
      case '-h':
        printHelp();
        return 0;

      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        return 1;
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
tcp-handshake - TCP handshake automaton verifier

Usage: tcp-handshake <command> [options]

Commands:
  describe             Show states, alphabet and transition table
  verify <symbol...>   Verify a whole packet sequence
  step <symbol>        Apply one symbol to the saved session
  reset                Reset the saved session to the start state
  history              Show the saved session's transitions
  validate [file]      Validate an automaton definition file
  examples             Run the example packet sequences
  help                 Show this help message

Options:
  -d, --definition <file>   Automaton definition (default: .handshake/automaton.yaml or built-in)
  -n, --limit <n>           Number of history entries to show (default: 20)

Examples:
  tcp-handshake verify LISTEN SYN ACK
  tcp-handshake verify SYN,SYN_ACK
  tcp-handshake step LISTEN
  tcp-handshake history --limit 5
`);
}
