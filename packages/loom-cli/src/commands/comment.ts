import { Command } from 'commander';
import type { Task } from 'loom-core';
import { handleError } from '../errors.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export function runComment(options: {
  services: Services;
  taskId: string;
  body: string;
  ref?: string;
  json: boolean;
}): Task {
  const { services, taskId, body, ref, json } = options;
  const task = services.taskService.comment(taskId, body, ref === undefined ? {} : { ref });
  if (json) {
    console.log(JSON.stringify(task));
  } else {
    console.log(`✓ Commented on ${task.task_id}`);
  }
  return task;
}

export function createCommentCommand(): Command {
  return new Command('comment')
    .description('Add a comment to a task')
    .argument('<taskId>', 'Task id or unique prefix')
    .argument('<body>', 'Comment text')
    .option('-r, --ref <ref>', 'Commit, file or URL the comment refers to')
    .action(function (this: Command, rawId: string, body: string, opts: { ref?: string }) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runComment({ services, taskId: resolveId(services, rawId), body, ref: opts.ref, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
