import { Command } from 'commander';
import type { CreateTaskInput, Priority, Task } from 'loom-core';
import { readConfig } from '../config.js';
import { handleError } from '../errors.js';
import { parsePriority, parseTags } from '../parse.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export interface AddOptions {
  services: Services;
  title: string;
  description?: string;
  priority?: Priority;
  tags?: string[];
  assignee?: string;
  stream?: string;
  json: boolean;
}

export function runAdd(options: AddOptions): Task {
  const { services, json } = options;
  const input: CreateTaskInput = { title: options.title };
  if (options.description !== undefined) input.description = options.description;
  if (options.priority !== undefined) input.priority = options.priority;
  if (options.tags !== undefined && options.tags.length > 0) input.tags = options.tags;
  if (options.assignee !== undefined) input.assignee = options.assignee;
  if (options.stream !== undefined) input.stream = options.stream;

  const task = services.taskService.createTask(input);

  if (json) {
    console.log(JSON.stringify(task));
  } else {
    console.log(`✓ Created task ${task.task_id}: ${task.title}`);
  }
  return task;
}

interface AddCommandOptions {
  description?: string;
  priority?: string;
  tags?: string;
  assignee?: string;
  stream?: string;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Create a task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .option('-p, --priority <priority>', 'Priority p0 (highest) to p3')
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .option('-a, --assignee <name>', 'Assign on creation')
    .option('-s, --stream <stream>', 'Work stream')
    .action(function (this: Command, title: string, opts: AddCommandOptions) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        const priority = opts.priority ?? readConfig().defaultPriority;
        runAdd({
          services,
          title,
          description: opts.description,
          priority: priority === undefined ? undefined : parsePriority(priority),
          tags: opts.tags === undefined ? undefined : parseTags(opts.tags),
          assignee: opts.assignee,
          stream: opts.stream,
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
