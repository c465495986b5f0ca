import { Command } from 'commander';
import { daysBefore, type ArchiveResult } from 'loom-core';
import { readConfig } from '../config.js';
import { CLIError, ExitCode, handleError } from '../errors.js';
import { parseDate, parsePositiveInteger } from '../parse.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export const DEFAULT_ARCHIVE_AFTER_DAYS = 30;

export function runArchive(options: {
  services: Services;
  before: Date;
  dryRun?: boolean;
  json: boolean;
}): ArchiveResult {
  const { services, before, dryRun = false, json } = options;
  const result = services.archiveService.archive({ before, dryRun });

  if (json) {
    console.log(JSON.stringify(result));
    return result;
  }

  if (result.count === 0) {
    console.log(`No completed tasks before ${before.toISOString()}`);
  } else if (result.dry_run) {
    console.log(`Would archive ${result.count} task(s) into ${result.months.join(', ')}:`);
    for (const id of result.task_ids) console.log(`  ${id}`);
  } else {
    console.log(`✓ Archived ${result.count} task(s) into ${result.months.join(', ')}`);
  }
  return result;
}

/**
 * `--before` wins over `--days`; with neither, the cutoff is
 * `archiveAfterDays` from config (30 when unset) before now.
 */
export function resolveCutoff(
  opts: { before?: string; days?: string },
  archiveAfterDays: number = DEFAULT_ARCHIVE_AFTER_DAYS,
  now: Date = new Date()
): Date {
  if (opts.before !== undefined && opts.days !== undefined) {
    throw new CLIError('Use either --before or --days', ExitCode.InvalidInput);
  }
  if (opts.before !== undefined) return parseDate(opts.before, 'before');
  const days = opts.days === undefined ? archiveAfterDays : parsePositiveInteger(opts.days, 'days');
  return daysBefore(now, days);
}

export function createArchiveCommand(): Command {
  return new Command('archive')
    .description('Move histories of tasks completed before a cutoff into archive/')
    .option('--before <date>', 'Archive tasks completed before this date (YYYY-MM-DD or ISO-8601)')
    .option('--days <n>', 'Archive tasks completed more than n days ago')
    .option('--dry-run', 'Report what would move without changing files')
    .action(function (this: Command, opts: { before?: string; days?: string; dryRun?: boolean }) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const before = resolveCutoff(opts, readConfig().archiveAfterDays);
        runArchive({ services: openFromGlobals(globalOpts), before, dryRun: opts.dryRun, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
