import { Command } from 'commander';
import type { Diagnostic } from 'loom-core';
import { handleError } from '../errors.js';
import { openFromGlobals, warnDiagnostics, type Services } from '../services.js';
import { GlobalOptionsSchema } from '../types.js';

export interface RebuildResult {
  events: number;
  tasks: number;
  fingerprint: string;
  diagnostics: Diagnostic[];
}

export function runRebuild(options: { services: Services; json: boolean }): RebuildResult {
  const { services, json } = options;
  const snapshot = services.taskService.rebuild();
  const result: RebuildResult = {
    events: snapshot.eventCount,
    tasks: Object.keys(snapshot.tasks).length,
    fingerprint: snapshot.fingerprint,
    diagnostics: snapshot.diagnostics,
  };

  if (json) {
    console.log(JSON.stringify(result));
  } else {
    warnDiagnostics(snapshot.diagnostics);
    console.log(`✓ Rebuilt ${result.tasks} task(s) from ${result.events} event(s)`);
  }
  return result;
}

export function createRebuildCommand(): Command {
  return new Command('rebuild')
    .description('Discard the caches and replay the active logs')
    .action(function (this: Command) {
      const globalOpts = GlobalOptionsSchema.parse(this.optsWithGlobals());
      try {
        runRebuild({ services: openFromGlobals(globalOpts), json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
