import { Command } from 'commander';
import { createRequire } from 'node:module';
import { createInitCommand } from './commands/init.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createHistoryCommand } from './commands/history.js';
import { createUpdateCommand } from './commands/update.js';
import { createAssignCommand, createUnassignCommand } from './commands/assign.js';
import { createCommentCommand } from './commands/comment.js';
import { createLinkCommand, createUnlinkCommand } from './commands/link.js';
import { createStreamCommand } from './commands/stream.js';
import { createCompleteCommand } from './commands/complete.js';
import { createReopenCommand } from './commands/reopen.js';
import { createRebuildCommand } from './commands/rebuild.js';
import { createArchiveCommand } from './commands/archive.js';
import { createValidateCommand } from './commands/validate.js';
import { CLIError, ExitCode } from './errors.js';
import { createErrorEnvelope } from './output.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

export interface UsageErrorDetails {
  received: string;
  reason: string;
  did_you_mean?: string[];
  examples: string[];
}

const EXAMPLES = ['loom add "Fix the flaky test" -p p1', 'loom list --status open', 'loom show TASK_ID'];

export function createProgram(): Command {
  const program = new Command();

  program
    .name('loom')
    .description('Task tracker whose history lives in git as plain JSONL event logs.')
    .version(version)
    .option('--root <path>', 'Workspace root (the .loom directory)')
    .option('--author <name>', 'Author recorded on new events')
    .option('--branch <name>', 'Branch recorded on new events')
    .option('--format <format>', 'Output format: text or json', 'text')
    .option('--json', 'Shorthand for --format json');

  program.addCommand(createInitCommand());
  program.addCommand(createAddCommand());
  program.addCommand(createListCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createHistoryCommand());
  program.addCommand(createUpdateCommand());
  program.addCommand(createAssignCommand());
  program.addCommand(createUnassignCommand());
  program.addCommand(createCommentCommand());
  program.addCommand(createLinkCommand());
  program.addCommand(createUnlinkCommand());
  program.addCommand(createStreamCommand());
  program.addCommand(createCompleteCommand());
  program.addCommand(createReopenCommand());
  program.addCommand(createRebuildCommand());
  program.addCommand(createArchiveCommand());
  program.addCommand(createValidateCommand());

  return program;
}

export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const prev = new Array<number>(b.length + 1);
  const curr = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j += 1) prev[j] = j;

  for (let i = 1; i <= a.length; i += 1) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
    }
    for (let j = 0; j <= b.length; j += 1) prev[j] = curr[j];
  }

  return prev[b.length];
}

/**
 * Unique prefix match first, then the single closest name within two edits.
 */
export function suggestCommand(token: string, candidates: readonly string[]): string | null {
  const prefixMatches = candidates.filter((candidate) => candidate.startsWith(token));
  if (prefixMatches.length === 1) return prefixMatches[0];
  if (prefixMatches.length > 1) return null;

  const scored = candidates
    .map((candidate) => ({ candidate, distance: editDistance(token, candidate) }))
    .filter((entry) => entry.distance <= 2)
    .sort((left, right) => left.distance - right.distance);

  if (scored.length === 0) return null;
  if (scored.length > 1 && scored[0].distance === scored[1].distance) return null;
  return scored[0].candidate;
}

export function buildUsageError(args: string[], program: Command, rawMessage: string): CLIError {
  const message = rawMessage.replace(/^error:\s*/i, '').trim();
  const received = `loom ${args.join(' ')}`.trim();

  const unknownCommand = message.match(/unknown command '([^']+)'/i);
  if (unknownCommand) {
    const unknown = unknownCommand[1];
    const best = suggestCommand(
      unknown,
      program.commands.map((command) => command.name())
    );
    const details: UsageErrorDetails = {
      received,
      reason: `Unknown command '${unknown}'.`,
      did_you_mean: best ? [best] : undefined,
      examples: best ? [`loom ${best} --help`, ...EXAMPLES].slice(0, 3) : EXAMPLES,
    };
    return new CLIError(`Unknown command '${unknown}'`, ExitCode.InvalidUsage, 'invalid_usage', details);
  }

  const details: UsageErrorDetails = {
    received,
    reason: message || 'Invalid command usage.',
    examples: EXAMPLES,
  };
  return new CLIError(
    message ? `Could not parse the command: ${message}` : 'Could not parse the command',
    ExitCode.InvalidUsage,
    'invalid_usage',
    details
  );
}

function requestedJson(args: readonly string[]): boolean {
  if (args.includes('--json')) return true;
  const index = args.indexOf('--format');
  if (index !== -1) return args[index + 1] === 'json';
  return args.includes('--format=json');
}

function renderUsageError(error: CLIError, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(createErrorEnvelope(error.code, error.message, error.details)));
  } else {
    console.error(`Error: ${error.message}`);
    const details = error.details;
    if (typeof details === 'object' && details !== null) {
      if ('did_you_mean' in details && Array.isArray(details.did_you_mean)) {
        console.error(`Did you mean: ${details.did_you_mean.join(', ')}`);
      }
      if ('examples' in details && Array.isArray(details.examples)) {
        console.error('Examples:');
        for (const example of details.examples) console.error(`  ${String(example)}`);
      }
    }
  }
  process.exit(error.exitCode);
}

function isCommanderError(error: unknown): error is Error & { code: string; exitCode: number } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('commander.') &&
    'exitCode' in error &&
    typeof error.exitCode === 'number'
  );
}

function applyCommanderOverrides(command: Command): void {
  command.exitOverride();
  command.configureOutput({
    writeErr: () => {},
  });
  for (const child of command.commands) {
    applyCommanderOverrides(child);
  }
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  applyCommanderOverrides(program);
  const args = argv.slice(2);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isCommanderError(error)) {
      if (error.exitCode === ExitCode.Success) return;
      renderUsageError(buildUsageError(args, program, error.message), requestedJson(args));
      return;
    }
    throw error;
  }
}

export { CLIError, ExitCode };
