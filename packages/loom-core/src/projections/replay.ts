import { compareDiagnostics, createDiagnostic, DiagnosticKind, type Diagnostic } from '../events/diagnostics.js';
import { sortCanonical } from '../events/ordering.js';
import { readLogs, type LocatedEvent } from '../events/reader.js';
import { OperationType, parseOperation } from '../events/types.js';
import type { Workspace } from '../store/workspace.js';
import { applyOperation, seedTask, toIndexEntry, touchTask, type IndexEntry, type Task } from './task-state.js';

export interface ReplayResult {
  /** Materialized tasks keyed by id, inserted in id order. */
  tasks: Map<string, Task>;
  index: Record<string, IndexEntry>;
  diagnostics: Diagnostic[];
  eventCount: number;
}

export interface ReplayOptions {
  includeArchive?: boolean;
}

/**
 * Keeps one copy of each event_id and reports the others. When copies
 * differ, the lexically smallest raw line wins so the choice never depends
 * on file order.
 */
export function dedupeEvents(
  events: readonly LocatedEvent[],
  diagnostics: Diagnostic[] = []
): LocatedEvent[] {
  const byId = new Map<string, LocatedEvent>();
  const dropped: LocatedEvent[] = [];
  for (const located of events) {
    const existing = byId.get(located.event.event_id);
    if (!existing) {
      byId.set(located.event.event_id, located);
    } else if (located.raw < existing.raw) {
      byId.set(located.event.event_id, located);
      dropped.push(existing);
    } else {
      dropped.push(located);
    }
  }

  for (const { event, source } of dropped) {
    diagnostics.push(
      createDiagnostic(DiagnosticKind.DuplicateEventId, `Event ${event.event_id} appears more than once`, {
        file: source.file,
        line: source.line,
        task_id: event.task_id,
        event_id: event.event_id,
      })
    );
  }
  return [...byId.values()];
}

function replayTask(
  taskId: string,
  group: LocatedEvent[],
  diagnostics: Diagnostic[]
): Task | null {
  let task: Task | null = null;

  for (const located of sortCanonical(group)) {
    const { event, source } = located;
    const where = { file: source.file, line: source.line, task_id: taskId, event_id: event.event_id };
    const parsed = parseOperation(event.operation);

    if (parsed.status === 'invalid') {
      diagnostics.push(
        createDiagnostic(DiagnosticKind.InvalidEvent, `Invalid ${event.operation.type} operation: ${parsed.message}`, where)
      );
      continue;
    }

    if (task === null) {
      if (parsed.status === 'ok' && parsed.operation.type === OperationType.Create) {
        task = seedTask(event, parsed.operation);
      } else {
        diagnostics.push(
          createDiagnostic(DiagnosticKind.OrphanEvent, `Event for task ${taskId} has no preceding create`, where)
        );
      }
      continue;
    }

    if (parsed.status === 'unknown') {
      task = touchTask(task, event);
      continue;
    }

    if (parsed.operation.type === OperationType.Create) {
      diagnostics.push(
        createDiagnostic(DiagnosticKind.DuplicateCreate, `Task ${taskId} is created more than once`, where)
      );
    }
    task = applyOperation(task, event, parsed.operation);
  }

  if (task === null) return null;
  const lastSeq = group.reduce((max, located) => Math.max(max, located.event.seq), task.last_seq);
  return lastSeq === task.last_seq ? task : { ...task, last_seq: lastSeq };
}

/**
 * Rebuilds task state from events in any file order. Events are grouped per
 * task, put in canonical order and folded; problems become diagnostics.
 */
export function replayEvents(
  events: readonly LocatedEvent[],
  readDiagnostics: readonly Diagnostic[] = []
): ReplayResult {
  const diagnostics: Diagnostic[] = [...readDiagnostics];
  const unique = dedupeEvents(events, diagnostics);

  const groups = new Map<string, LocatedEvent[]>();
  for (const located of unique) {
    const group = groups.get(located.event.task_id);
    if (group) {
      group.push(located);
    } else {
      groups.set(located.event.task_id, [located]);
    }
  }

  const tasks = new Map<string, Task>();
  for (const taskId of [...groups.keys()].sort()) {
    const group = groups.get(taskId) ?? [];
    const task = replayTask(taskId, group, diagnostics);
    if (task) {
      tasks.set(taskId, task);
    }
  }

  diagnostics.sort(compareDiagnostics);
  const index = Object.fromEntries(
    [...tasks].map(([taskId, task]): [string, IndexEntry] => [taskId, toIndexEntry(task)])
  );
  return { tasks, index, diagnostics, eventCount: unique.length };
}

export function replayWorkspace(workspace: Workspace, options: ReplayOptions = {}): ReplayResult {
  const { events, diagnostics } = readLogs(
    workspace.listLogFiles({ includeArchive: options.includeArchive ?? false })
  );
  return replayEvents(events, diagnostics);
}
