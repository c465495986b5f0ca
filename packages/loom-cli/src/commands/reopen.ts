import { Command } from 'commander';
import type { Task } from 'loom-core';
import { handleError } from '../errors.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export function runReopen(options: { services: Services; taskId: string; reason?: string; json: boolean }): Task {
  const { services, taskId, reason, json } = options;
  const task = services.taskService.reopen(taskId, reason === undefined ? {} : { reason });
  if (json) {
    console.log(JSON.stringify(task));
  } else {
    console.log(`✓ Reopened ${task.task_id}`);
  }
  return task;
}

export function createReopenCommand(): Command {
  return new Command('reopen')
    .description('Reopen a completed task')
    .argument('<taskId>', 'Task id or unique prefix')
    .option('--reason <text>', 'Why the task is reopened')
    .action(function (this: Command, rawId: string, opts: { reason?: string }) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runReopen({ services, taskId: resolveId(services, rawId), reason: opts.reason, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
