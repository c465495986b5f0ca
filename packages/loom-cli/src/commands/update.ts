import { Command } from 'commander';
import type { FieldUpdate, Task } from 'loom-core';
import { CLIError, ExitCode, handleError } from '../errors.js';
import { parsePriority, parseTags } from '../parse.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export function runUpdate(options: {
  services: Services;
  taskId: string;
  updates: FieldUpdate[];
  json: boolean;
}): Task {
  const { services, taskId, updates, json } = options;
  if (updates.length === 0) {
    throw new CLIError('Nothing to update', ExitCode.InvalidInput, undefined, undefined, [
      'loom update TASK_ID --title "New title"',
    ]);
  }

  // one event per field
  let task = services.taskService.get(taskId);
  for (const update of updates) {
    task = services.taskService.updateField(taskId, update);
  }

  if (json) {
    console.log(JSON.stringify(task));
  } else {
    console.log(`✓ Updated task ${task.task_id}: ${updates.map((u) => u.field).join(', ')}`);
  }
  return task;
}

interface UpdateCommandOptions {
  title?: string;
  description?: string;
  clearDescription?: boolean;
  priority?: string;
  tags?: string;
}

export function collectUpdates(opts: UpdateCommandOptions): FieldUpdate[] {
  if (opts.description !== undefined && opts.clearDescription) {
    throw new CLIError('Use either --description or --clear-description', ExitCode.InvalidInput);
  }
  const updates: FieldUpdate[] = [];
  if (opts.title !== undefined) updates.push({ field: 'title', value: opts.title });
  if (opts.description !== undefined) updates.push({ field: 'description', value: opts.description });
  if (opts.clearDescription) updates.push({ field: 'description', value: null });
  if (opts.priority !== undefined) updates.push({ field: 'priority', value: parsePriority(opts.priority) });
  if (opts.tags !== undefined) updates.push({ field: 'tags', value: parseTags(opts.tags) });
  return updates;
}

export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Change title, description, priority or tags')
    .argument('<taskId>', 'Task id or unique prefix')
    .option('--title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('--clear-description', 'Remove the description')
    .option('-p, --priority <priority>', 'New priority')
    .option('-t, --tags <tags>', 'Replace tags (comma-separated, empty to clear)')
    .action(function (this: Command, rawId: string, opts: UpdateCommandOptions) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runUpdate({
          services,
          taskId: resolveId(services, rawId),
          updates: collectUpdates(opts),
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
