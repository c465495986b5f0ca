import { Command } from 'commander';
import type { Task } from 'loom-core';
import { handleError } from '../errors.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export interface ShowResult {
  task: Task;
  archived: boolean;
}

function formatLinks(task: Task): string[] {
  const lines: string[] = [];
  for (const rel of ['blocks', 'blocked_by', 'parent'] as const) {
    if (task.links[rel].length > 0) lines.push(`  ${rel}: ${task.links[rel].join(', ')}`);
  }
  return lines;
}

export function runShow(options: {
  services: Services;
  taskId: string;
  includeArchived?: boolean;
  json: boolean;
}): ShowResult {
  const { services, taskId, includeArchived = false, json } = options;
  const task = services.taskService.get(taskId, { includeArchived });
  const archived = includeArchived && services.taskService.isArchived(taskId);
  const result: ShowResult = { task, archived };

  if (json) {
    console.log(JSON.stringify(result));
    return result;
  }

  console.log(`Task: ${task.task_id}${archived ? ' (archived)' : ''}`);
  console.log(`Title: ${task.title}`);
  console.log(`Status: ${task.status}${task.resolution ? ` (${task.resolution})` : ''}`);
  console.log(`Priority: ${task.priority}`);
  if (task.assignee) console.log(`Assignee: ${task.assignee}`);
  if (task.stream) console.log(`Stream: ${task.stream}`);
  if (task.tags.length > 0) console.log(`Tags: ${task.tags.join(', ')}`);
  console.log(`Created: ${task.created_at} by ${task.created_by} on ${task.created_branch}`);
  console.log(`Updated: ${task.updated_at}`);
  if (task.completed_at) console.log(`Completed: ${task.completed_at}`);
  if (task.description) {
    console.log('');
    console.log(task.description);
  }

  const links = formatLinks(task);
  if (links.length > 0) {
    console.log('\nLinks:');
    for (const line of links) console.log(line);
  }

  if (task.comments.length > 0) {
    console.log('\nComments:');
    for (const comment of task.comments) {
      const ref = comment.ref ? ` [${comment.ref}]` : '';
      console.log(`  [${comment.timestamp}] ${comment.author}${ref}: ${comment.body}`);
    }
  }
  return result;
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show one task')
    .argument('<taskId>', 'Task id or unique prefix')
    .option('--archived', 'Allow showing an archived task')
    .action(function (this: Command, rawId: string, opts: { archived?: boolean }) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runShow({
          services,
          taskId: resolveId(services, rawId),
          includeArchived: opts.archived ?? false,
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
