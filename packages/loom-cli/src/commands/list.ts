import { Command } from 'commander';
import type { ListTasksOptions, TaskListItem } from 'loom-core';
import { handleError } from '../errors.js';
import { printTable } from '../output.js';
import { parsePriority, parseStatusFilter } from '../parse.js';
import { openFromGlobals, warnDiagnostics, type Services } from '../services.js';
import { createShortId } from '../short-id.js';
import { GlobalOptionsSchema } from '../types.js';

export interface ListResult {
  tasks: TaskListItem[];
  total: number;
}

export function runList(options: {
  services: Services;
  filter?: ListTasksOptions;
  json: boolean;
  /** Print full task ids, one per line, for scripting. */
  ids?: boolean;
}): ListResult {
  const { services, filter = {}, json, ids = false } = options;
  const tasks = services.taskService.list(filter);
  const result: ListResult = { tasks, total: tasks.length };

  if (json) {
    console.log(JSON.stringify(result));
    return result;
  }

  if (ids) {
    for (const task of tasks) console.log(task.task_id);
    return result;
  }

  if (tasks.length === 0) {
    console.log('No tasks found');
    return result;
  }

  const shortId = createShortId(tasks.map((task) => task.task_id));
  printTable(
    tasks.map((task) => ({
      id: shortId(task.task_id),
      priority: task.priority,
      status: task.status,
      title: task.title,
      assignee: task.assignee,
      stream: task.stream,
      tags: task.tags,
    })),
    ['id', 'priority', 'status', 'title', 'assignee', 'stream', 'tags']
  );
  return result;
}

interface ListCommandOptions {
  status?: string;
  assignee?: string;
  tag?: string;
  priority?: string;
  stream?: string;
  archived?: boolean;
  ids?: boolean;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks ordered by priority, then age')
    .option('--status <status>', 'open, complete or all', 'all')
    .option('-a, --assignee <name>', 'Only tasks assigned to this name')
    .option('-t, --tag <tag>', 'Only tasks carrying this tag')
    .option('-p, --priority <priority>', 'Only tasks at this priority')
    .option('-s, --stream <stream>', 'Only tasks in this stream')
    .option('--archived', 'Include archived tasks')
    .option('--ids', 'Print only full task ids, one per line')
    .action(function (this: Command, opts: ListCommandOptions) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        warnDiagnostics(services.taskService.snapshot().diagnostics);
        runList({
          services,
          filter: {
            status: opts.status === undefined ? undefined : parseStatusFilter(opts.status),
            assignee: opts.assignee,
            tag: opts.tag,
            priority: opts.priority === undefined ? undefined : parsePriority(opts.priority),
            stream: opts.stream,
            includeArchived: opts.archived ?? false,
          },
          json: globalOpts.json,
          ids: opts.ids ?? false,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
