import { Command } from 'commander';
import type { EventEnvelope, LinkRelation } from 'loom-core';
import { handleError } from '../errors.js';
import { parseRelation } from '../parse.js';
import { resolveId } from '../resolve-id.js';
import { openFromGlobals, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export interface LinkResult {
  task_id: string;
  rel: LinkRelation;
  target: string;
  linked: boolean;
  events: EventEnvelope[];
}

export function runLink(options: {
  services: Services;
  taskId: string;
  rel: LinkRelation;
  target: string;
  remove?: boolean;
  json: boolean;
}): LinkResult {
  const { services, taskId, rel, target, remove = false, json } = options;
  const events = remove
    ? services.taskService.unlink(taskId, rel, target)
    : services.taskService.link(taskId, rel, target);
  const result: LinkResult = { task_id: taskId, rel, target, linked: !remove, events };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${remove ? 'Unlinked' : 'Linked'} ${taskId} ${rel} ${target}`);
  }
  return result;
}

function createLinkLikeCommand(name: 'link' | 'unlink', description: string): Command {
  return new Command(name)
    .description(description)
    .argument('<taskId>', 'Task id or unique prefix')
    .argument('<rel>', 'blocks, blocked_by or parent')
    .argument('<target>', 'Other task id or unique prefix')
    .action(function (this: Command, rawId: string, rawRel: string, rawTarget: string) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        const services = openFromGlobals(globalOpts);
        runLink({
          services,
          taskId: resolveId(services, rawId),
          rel: parseRelation(rawRel),
          target: resolveId(services, rawTarget),
          remove: name === 'unlink',
          json: globalOpts.json,
        });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}

export function createLinkCommand(): Command {
  return createLinkLikeCommand('link', 'Link two tasks');
}

export function createUnlinkCommand(): Command {
  return createLinkLikeCommand('unlink', 'Remove a link between two tasks');
}
