import fs from 'fs';
import type { Workspace } from '../store/workspace.js';
import { dedupeEvents } from '../projections/replay.js';
import { generateId } from '../utils/id.js';
import { sortCanonical } from './ordering.js';
import { readLogs, type LogReadResult } from './reader.js';
import {
  EventEnvelopeSchema,
  OperationType,
  SCHEMA_VERSION,
  validateOperation,
  type EventEnvelope,
  type Operation,
} from './types.js';

export interface AppendEventInput {
  event_id?: string;
  /** Omitted for `create`: the new task takes the id of its creating event. */
  task_id?: string;
  seq: number;
  operation: Operation;
  author: string;
  branch: string;
  timestamp?: string;
}

export interface EventStoreOptions {
  clock?: () => Date;
}

export interface ReadEventsOptions {
  includeArchive?: boolean;
}

export class EventStore {
  private clock: () => Date;

  constructor(private workspace: Workspace, options: EventStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  append(input: AppendEventInput): EventEnvelope {
    const operation = validateOperation(input.operation);
    const eventId = input.event_id ?? generateId();
    const taskId = input.task_id ?? (operation.type === OperationType.Create ? eventId : undefined);
    if (!taskId) {
      throw new Error(`task_id is required for ${operation.type} events`);
    }

    const event: EventEnvelope = {
      v: SCHEMA_VERSION,
      event_id: eventId,
      task_id: taskId,
      seq: input.seq,
      timestamp: input.timestamp ?? this.clock().toISOString(),
      author: input.author,
      branch: input.branch,
      operation,
    };
    this.write(event);
    return event;
  }

  write(event: EventEnvelope): string {
    return appendEvent(this.workspace, event);
  }

  read(options: ReadEventsOptions = {}): LogReadResult {
    return readLogs(this.workspace.listLogFiles(options));
  }

  /**
   * Full history of one task across active and archived logs, in canonical
   * order. Physical position in the files plays no part, and duplicate
   * event ids resolve to the same copy replay keeps.
   */
  getByTaskId(taskId: string): EventEnvelope[] {
    const { events } = this.read({ includeArchive: true });
    const matching = dedupeEvents(events).filter(({ event }) => event.task_id === taskId);
    return sortCanonical(matching).map(({ event }) => event);
  }
}

/**
 * Appends a fully formed event as one line of the file for its UTC day.
 *
 * The line is written with a single write on an append-mode descriptor and
 * fsync'd before returning. A crash can at worst leave a torn final line,
 * which readers skip; if one is found here, a newline is written first so
 * the new record starts on its own line.
 */
export function appendEvent(workspace: Workspace, event: EventEnvelope): string {
  const checked = EventEnvelopeSchema.parse(event);
  const filePath = workspace.eventFileFor(checked.timestamp);
  fs.mkdirSync(workspace.eventsDir, { recursive: true });

  const fd = fs.openSync(filePath, 'a+');
  try {
    const prefix = endsWithNewline(fd) ? '' : '\n';
    fs.writeSync(fd, `${prefix}${JSON.stringify(event)}\n`);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
  return filePath;
}

function endsWithNewline(fd: number): boolean {
  const { size } = fs.fstatSync(fd);
  if (size === 0) return true;
  const last = Buffer.alloc(1);
  fs.readSync(fd, last, 0, 1, size - 1);
  return last[0] === 0x0a;
}
