import { Command } from 'commander';
import type { Resolution, Task } from 'loom-core';
import { handleError } from '../errors.js';
import { parseResolution } from '../parse.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export function runComplete(options: {
  services: Services;
  taskId: string;
  resolution?: Resolution;
  json: boolean;
}): Task {
  const { services, taskId, resolution = 'done', json } = options;
  const task = services.taskService.complete(taskId, resolution);
  if (json) {
    console.log(JSON.stringify(task));
  } else {
    console.log(`✓ Completed ${task.task_id} (${resolution})`);
  }
  return task;
}

export function createCompleteCommand(): Command {
  return new Command('complete')
    .description('Mark a task complete')
    .argument('<taskId>', 'Task id or unique prefix')
    .option('-r, --resolution <resolution>', 'done, wontfix, duplicate or obsolete', 'done')
    .action(function (this: Command, rawId: string, opts: { resolution: string }) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runComplete({
          services,
          taskId: resolveId(services, rawId),
          resolution: parseResolution(opts.resolution),
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
