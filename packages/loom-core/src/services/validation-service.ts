import {
  compareDiagnostics,
  createDiagnostic,
  DiagnosticKind,
  type Diagnostic,
  type DiagnosticSeverity,
} from '../events/diagnostics.js';
import { sortCanonical } from '../events/ordering.js';
import { readLogs, type LocatedEvent } from '../events/reader.js';
import {
  OperationType,
  SCHEMA_VERSION,
  TaskStatus,
  isKnownOperationType,
  parseOperation,
  type LinkRelation,
  type Resolution,
} from '../events/types.js';
import { replayEvents } from '../projections/replay.js';
import type { Task } from '../projections/task-state.js';
import type { Workspace } from '../store/workspace.js';

export interface ValidateOptions {
  /** Treat warnings as failures. */
  strict?: boolean;
}

export interface ValidationResult {
  valid: boolean;
  files: number;
  events: number;
  errors: number;
  warnings: number;
  conflicts: number;
  diagnostics: Diagnostic[];
}

const SYMMETRIC: Array<[LinkRelation, LinkRelation]> = [
  ['blocks', 'blocked_by'],
  ['blocked_by', 'blocks'],
];

function locate(located: LocatedEvent) {
  return {
    file: located.source.file,
    line: located.source.line,
    task_id: located.event.task_id,
    event_id: located.event.event_id,
  };
}

function groupByTask(events: readonly LocatedEvent[]): Map<string, LocatedEvent[]> {
  const groups = new Map<string, LocatedEvent[]>();
  for (const located of events) {
    const group = groups.get(located.event.task_id);
    if (group) group.push(located);
    else groups.set(located.event.task_id, [located]);
  }
  return groups;
}

/**
 * Structural check of every active and archived log. Reads raw files and
 * never trusts the caches.
 */
export class ValidationService {
  constructor(private workspace: Workspace) {}

  validate(opts: ValidateOptions = {}): ValidationResult {
    const files = this.workspace.listLogFiles({ includeArchive: true });
    const { events, diagnostics: readDiagnostics } = readLogs(files);
    const diagnostics: Diagnostic[] = [...readDiagnostics];

    const unique = this.checkEvents(events, diagnostics);
    const groups = groupByTask(unique);
    for (const [taskId, group] of groups) {
      this.checkTask(taskId, group, diagnostics);
    }
    this.checkSequenceOrder(unique, diagnostics);

    const { tasks } = replayEvents(unique);
    this.checkLinks(tasks, diagnostics);

    diagnostics.sort(compareDiagnostics);
    const count = (severity: DiagnosticSeverity) => diagnostics.filter((d) => d.severity === severity).length;
    const errors = count('error');
    const warnings = count('warning');

    return {
      valid: errors === 0 && (!opts.strict || warnings === 0),
      files: files.length,
      events: events.length,
      errors,
      warnings,
      conflicts: count('conflict'),
      diagnostics,
    };
  }

  /**
   * Per-event checks. Returns the events with duplicate ids removed, the
   * first occurrence kept.
   */
  private checkEvents(events: readonly LocatedEvent[], diagnostics: Diagnostic[]): LocatedEvent[] {
    const seen = new Map<string, LocatedEvent>();
    const unique: LocatedEvent[] = [];

    for (const located of events) {
      const { event } = located;
      const first = seen.get(event.event_id);
      if (first) {
        diagnostics.push(
          createDiagnostic(
            DiagnosticKind.DuplicateEventId,
            `Event ${event.event_id} already appears at ${first.source.file}:${first.source.line}`,
            locate(located)
          )
        );
        continue;
      }
      seen.set(event.event_id, located);
      unique.push(located);

      if (event.v > SCHEMA_VERSION) {
        diagnostics.push(
          createDiagnostic(
            DiagnosticKind.UnsupportedVersion,
            `Event version ${event.v} is newer than supported version ${SCHEMA_VERSION}`,
            locate(located)
          )
        );
      }

      if (!isKnownOperationType(event.operation.type)) {
        diagnostics.push(
          createDiagnostic(
            DiagnosticKind.UnknownOperation,
            `Unknown operation type '${event.operation.type}'`,
            locate(located)
          )
        );
        continue;
      }

      const parsed = parseOperation(event.operation);
      if (parsed.status === 'invalid') {
        diagnostics.push(
          createDiagnostic(
            DiagnosticKind.InvalidEvent,
            `Invalid ${event.operation.type} operation: ${parsed.message}`,
            locate(located)
          )
        );
      }
    }
    return unique;
  }

  private checkTask(taskId: string, group: LocatedEvent[], diagnostics: Diagnostic[]): void {
    const ordered = sortCanonical(group);
    const creates = ordered.filter(({ event }) => event.operation.type === OperationType.Create);

    if (creates.length === 0) {
      for (const located of ordered) {
        diagnostics.push(
          createDiagnostic(DiagnosticKind.OrphanEvent, `Event for task ${taskId} has no create`, locate(located))
        );
      }
      return;
    }
    for (const located of creates.slice(1)) {
      diagnostics.push(
        createDiagnostic(DiagnosticKind.DuplicateCreate, `Task ${taskId} is created more than once`, locate(located))
      );
    }

    const bySeqAndBranch = new Map<string, LocatedEvent>();
    for (const located of ordered) {
      const key = `${located.event.seq}\0${located.event.branch}`;
      const first = bySeqAndBranch.get(key);
      if (first) {
        diagnostics.push(
          createDiagnostic(
            DiagnosticKind.DuplicateSeq,
            `Task ${taskId} has two events with seq ${located.event.seq} on branch ${located.event.branch} (also ${first.event.event_id})`,
            locate(located)
          )
        );
      } else {
        bySeqAndBranch.set(key, located);
      }
    }

    this.checkResolutions(taskId, ordered, diagnostics);
  }

  /**
   * Walks the status timeline and reports a `complete` that lands on a task
   * already completed with a different resolution.
   */
  private checkResolutions(taskId: string, ordered: LocatedEvent[], diagnostics: Diagnostic[]): void {
    let status: TaskStatus = TaskStatus.Open;
    let resolution: Resolution | null = null;

    for (const located of ordered) {
      const parsed = parseOperation(located.event.operation);
      if (parsed.status !== 'ok') continue;
      const op = parsed.operation;

      if (op.type === OperationType.Complete) {
        if (status === TaskStatus.Complete && resolution !== null && resolution !== op.resolution) {
          diagnostics.push(
            createDiagnostic(
              DiagnosticKind.ResolutionConflict,
              `Task ${taskId} completed as ${op.resolution} while already complete as ${resolution}`,
              locate(located)
            )
          );
        }
        status = TaskStatus.Complete;
        resolution = op.resolution;
      } else if (op.type === OperationType.Reopen) {
        status = TaskStatus.Open;
        resolution = null;
      }
    }
  }

  /**
   * Within one file, events of a task written from one branch must not go
   * down in seq.
   */
  private checkSequenceOrder(events: readonly LocatedEvent[], diagnostics: Diagnostic[]): void {
    const lastSeq = new Map<string, number>();
    for (const located of events) {
      const { event, source } = located;
      const key = `${source.kind}\0${source.file}\0${event.task_id}\0${event.branch}`;
      const previous = lastSeq.get(key);
      if (previous !== undefined && event.seq < previous) {
        diagnostics.push(
          createDiagnostic(
            DiagnosticKind.NonMonotonicSeq,
            `Task ${event.task_id} seq ${event.seq} follows seq ${previous} in the same file`,
            locate(located)
          )
        );
      }
      lastSeq.set(key, Math.max(previous ?? 0, event.seq));
    }
  }

  private checkLinks(tasks: Map<string, Task>, diagnostics: Diagnostic[]): void {
    for (const task of tasks.values()) {
      for (const [rel, inverse] of SYMMETRIC) {
        for (const targetId of task.links[rel]) {
          const target = tasks.get(targetId);
          if (!target) {
            diagnostics.push(
              createDiagnostic(DiagnosticKind.DanglingLink, `Task ${task.task_id} ${rel} missing task ${targetId}`, {
                task_id: task.task_id,
              })
            );
          } else if (!target.links[inverse].includes(task.task_id)) {
            diagnostics.push(
              createDiagnostic(
                DiagnosticKind.AsymmetricLink,
                `Task ${task.task_id} ${rel} ${targetId} but ${targetId} does not record ${inverse} ${task.task_id}`,
                { task_id: task.task_id }
              )
            );
          }
        }
      }

      for (const parentId of task.links.parent) {
        if (!tasks.has(parentId)) {
          diagnostics.push(
            createDiagnostic(DiagnosticKind.DanglingLink, `Task ${task.task_id} parent missing task ${parentId}`, {
              task_id: task.task_id,
            })
          );
        }
      }
    }
  }
}
