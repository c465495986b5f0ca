import { Command } from 'commander';
import type { Task } from 'loom-core';
import { CLIError, ExitCode, handleError } from '../errors.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export function runStream(options: {
  services: Services;
  taskId: string;
  stream: string | null;
  json: boolean;
}): Task {
  const { services, taskId, stream, json } = options;
  const task = services.taskService.setStream(taskId, stream);
  if (json) {
    console.log(JSON.stringify(task));
  } else if (stream === null) {
    console.log(`✓ Cleared stream of ${task.task_id}`);
  } else {
    console.log(`✓ Moved ${task.task_id} to stream ${stream}`);
  }
  return task;
}

export function createStreamCommand(): Command {
  return new Command('stream')
    .description('Set or clear the work stream of a task')
    .argument('<taskId>', 'Task id or unique prefix')
    .argument('[stream]', 'Stream name')
    .option('--clear', 'Remove the task from its stream')
    .action(function (this: Command, rawId: string, stream: string | undefined, opts: { clear?: boolean }) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        if ((stream === undefined) === !opts.clear) {
          throw new CLIError('Give a stream name or --clear, not both', ExitCode.InvalidInput);
        }
        const services = openFromGlobals(globalOpts);
        runStream({ services, taskId: resolveId(services, rawId), stream: stream ?? null, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
