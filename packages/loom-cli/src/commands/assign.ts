import { Command } from 'commander';
import type { Task } from 'loom-core';
import { handleError } from '../errors.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export function runAssign(options: { services: Services; taskId: string; assignee: string; json: boolean }): Task {
  const { services, taskId, assignee, json } = options;
  const task = services.taskService.assign(taskId, assignee);
  if (json) {
    console.log(JSON.stringify(task));
  } else {
    console.log(`✓ Assigned ${task.task_id} to ${assignee}`);
  }
  return task;
}

export function runUnassign(options: { services: Services; taskId: string; json: boolean }): Task {
  const { services, taskId, json } = options;
  const task = services.taskService.unassign(taskId);
  if (json) {
    console.log(JSON.stringify(task));
  } else {
    console.log(`✓ Unassigned ${task.task_id}`);
  }
  return task;
}

export function createAssignCommand(): Command {
  return new Command('assign')
    .description('Assign a task')
    .argument('<taskId>', 'Task id or unique prefix')
    .argument('<assignee>', 'Who the task is assigned to')
    .action(function (this: Command, rawId: string, assignee: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runAssign({ services, taskId: resolveId(services, rawId), assignee, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}

export function createUnassignCommand(): Command {
  return new Command('unassign')
    .description('Clear the assignee of a task')
    .argument('<taskId>', 'Task id or unique prefix')
    .action(function (this: Command, rawId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runUnassign({ services, taskId: resolveId(services, rawId), json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
