import {
  ArchiveService,
  EventStore,
  StateCache,
  TaskService,
  ValidationService,
  Workspace,
  DiagnosticKind,
  formatLocation,
  type Diagnostic,
  type EventDefaults,
  type EventStoreOptions,
} from 'loom-core';
import { readConfig, resolveAuthor, resolveBranch, resolveRoot } from './config.js';
import type { GlobalOptions } from './types.js';

export interface Services {
  workspace: Workspace;
  eventStore: EventStore;
  cache: StateCache;
  taskService: TaskService;
  archiveService: ArchiveService;
  validationService: ValidationService;
}

export function createServices(
  workspace: Workspace,
  defaults: EventDefaults,
  storeOptions: EventStoreOptions = {}
): Services {
  const eventStore = new EventStore(workspace, storeOptions);
  const cache = new StateCache(workspace);
  return {
    workspace,
    eventStore,
    cache,
    taskService: new TaskService(workspace, eventStore, cache, defaults),
    archiveService: new ArchiveService(workspace, cache),
    validationService: new ValidationService(workspace),
  };
}

/**
 * Opens an existing workspace. An archival interrupted by a crash is
 * finished before anything reads the logs.
 */
export function openServices(root: string, defaults: EventDefaults): Services {
  const services = createServices(Workspace.open(root), defaults);
  if (services.archiveService.recover()) {
    console.error('Recovered an interrupted archive run');
  }
  return services;
}

/**
 * Prints one stderr line summarizing lines skipped while reading, plus one
 * line per diagnostic.
 */
export function warnDiagnostics(diagnostics: readonly Diagnostic[]): void {
  const skipped = diagnostics.filter((d) => d.kind === DiagnosticKind.ParseError || d.kind === DiagnosticKind.InvalidEvent);
  if (skipped.length === 0) return;
  console.error(`Warning: skipped ${skipped.length} malformed line(s); run 'loom validate' for details`);
  for (const diagnostic of skipped) {
    console.error(`  ${formatLocation(diagnostic)}: ${diagnostic.message}`);
  }
}

/**
 * Resolves root, author and branch from flags, environment and config, then
 * opens the workspace.
 */
export function openFromGlobals(globalOpts: Pick<GlobalOptions, 'root' | 'author' | 'branch'>): Services {
  const config = readConfig();
  const root = resolveRoot(globalOpts.root);
  return openServices(root, {
    author: resolveAuthor(globalOpts.author, config),
    branch: resolveBranch(globalOpts.branch),
  });
}
