import { Command } from 'commander';
import type { EventEnvelope } from 'loom-core';
import { handleError } from '../errors.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export interface HistoryResult {
  task_id: string;
  events: EventEnvelope[];
}

export function runHistory(options: { services: Services; taskId: string; json: boolean }): HistoryResult {
  const { services, taskId, json } = options;
  const events = services.taskService.history(taskId);
  const result: HistoryResult = { task_id: taskId, events };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    for (const event of events) {
      console.log(`#${event.seq} ${event.timestamp} ${event.author}@${event.branch} ${event.operation.type}`);
    }
  }
  return result;
}

export function createHistoryCommand(): Command {
  return new Command('history')
    .description('Show every event of a task, archived ones included')
    .argument('<taskId>', 'Task id or unique prefix')
    .action(function (this: Command, rawId: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runHistory({ services, taskId: resolveId(services, rawId), json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
