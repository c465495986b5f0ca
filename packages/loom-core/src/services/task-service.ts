import type { StateCache, StateSnapshot } from '../cache/state-cache.js';
import { readLogs } from '../events/reader.js';
import type { EventStore } from '../events/store.js';
import {
  OperationType,
  TaskStatus,
  type CreateOperation,
  type EventEnvelope,
  type LinkRelation,
  type Operation,
  type Priority,
  type Resolution,
  type UpdateFieldOperation,
} from '../events/types.js';
import { loadSnapshot, rebuildSnapshot } from '../projections/rebuild.js';
import { replayWorkspace } from '../projections/replay.js';
import { findTask, type Task } from '../projections/task-state.js';
import type { Workspace } from '../store/workspace.js';

export class TaskNotFoundError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

export class AmbiguousPrefixError extends Error {
  constructor(
    public readonly prefix: string,
    public readonly matches: string[]
  ) {
    super(`Ambiguous task id prefix '${prefix}' matches: ${matches.join(', ')}`);
    this.name = 'AmbiguousPrefixError';
  }
}

export class TaskArchivedError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} is archived and read-only`);
    this.name = 'TaskArchivedError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(taskId: string, operation: string, status: TaskStatus) {
    super(`Cannot ${operation} task ${taskId}: task is ${status}`);
    this.name = 'InvalidTransitionError';
  }
}

export class InvalidLinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidLinkError';
  }
}

export interface EventContext {
  author?: string;
  branch?: string;
}

export interface EventDefaults {
  author: string;
  branch: string;
}

export interface CreateTaskInput {
  title: string;
  description?: string;
  priority?: Priority;
  tags?: string[];
  assignee?: string;
  stream?: string;
}

export interface ApplyInput extends EventContext {
  /** Omitted for `create`. */
  task_id?: string;
  operation: Operation;
}

export type FieldUpdate =
  | { field: 'title'; value: string }
  | { field: 'description'; value: string | null }
  | { field: 'priority'; value: Priority }
  | { field: 'tags'; value: string[] };

export type StatusFilter = TaskStatus | 'all';

export interface ListTasksOptions {
  status?: StatusFilter;
  assignee?: string;
  tag?: string;
  priority?: Priority;
  stream?: string;
  includeArchived?: boolean;
}

export interface GetTaskOptions {
  includeArchived?: boolean;
}

export interface TaskListItem {
  task_id: string;
  title: string;
  status: TaskStatus;
  priority: Priority;
  assignee: string | null;
  stream: string | null;
  tags: string[];
  created_at: string;
  updated_at: string;
}

const INVERSE_RELATION: Record<LinkRelation, LinkRelation | null> = {
  blocks: 'blocked_by',
  blocked_by: 'blocks',
  parent: null,
};

function linkOperation(
  type: OperationType.Link | OperationType.Unlink,
  rel: LinkRelation,
  target: string
): Operation {
  return type === OperationType.Link
    ? { type: OperationType.Link, rel, target }
    : { type: OperationType.Unlink, rel, target };
}

function compareTasks(a: Task, b: Task): number {
  if (a.priority !== b.priority) return a.priority < b.priority ? -1 : 1;
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? -1 : 1;
  return a.task_id < b.task_id ? -1 : a.task_id > b.task_id ? 1 : 0;
}

function toListItem(task: Task): TaskListItem {
  return {
    task_id: task.task_id,
    title: task.title,
    status: task.status,
    priority: task.priority,
    assignee: task.assignee,
    stream: task.stream,
    tags: task.tags,
    created_at: task.created_at,
    updated_at: task.updated_at,
  };
}

export class TaskService {
  constructor(
    private workspace: Workspace,
    private eventStore: EventStore,
    private cache: StateCache,
    private defaults: EventDefaults = { author: 'unknown', branch: 'main' }
  ) {}

  /**
   * Current state of the active logs, served from the cache when it is
   * fresh and rebuilt otherwise.
   */
  snapshot(): StateSnapshot {
    return loadSnapshot(this.workspace, this.cache);
  }

  /**
   * Discards the cache and replays every active log.
   */
  rebuild(): StateSnapshot {
    this.cache.clear();
    const snapshot = rebuildSnapshot(this.workspace);
    this.cache.save(snapshot);
    return snapshot;
  }

  list(opts: ListTasksOptions = {}): TaskListItem[] {
    const status = opts.status ?? 'all';
    return this.allTasks(opts.includeArchived ?? false)
      .filter((task) => status === 'all' || task.status === status)
      .filter((task) => opts.assignee === undefined || task.assignee === opts.assignee)
      .filter((task) => opts.tag === undefined || task.tags.includes(opts.tag))
      .filter((task) => opts.priority === undefined || task.priority === opts.priority)
      .filter((task) => opts.stream === undefined || task.stream === opts.stream)
      .sort(compareTasks)
      .map(toListItem);
  }

  getTaskById(taskId: string, opts: GetTaskOptions = {}): Task | null {
    const active = findTask(this.snapshot().tasks, taskId);
    if (active) return active;
    if (!opts.includeArchived) return null;
    return replayWorkspace(this.workspace, { includeArchive: true }).tasks.get(taskId) ?? null;
  }

  get(taskId: string, opts: GetTaskOptions = {}): Task {
    const task = this.getTaskById(taskId, opts);
    if (!task) {
      if (!opts.includeArchived && this.isArchived(taskId)) throw new TaskArchivedError(taskId);
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  /**
   * Expands a unique id prefix, case-insensitively, against active and
   * archived tasks. Returns null when nothing matches.
   */
  resolveTaskId(prefix: string): string | null {
    const needle = prefix.toUpperCase();
    const ids = new Set(Object.keys(this.snapshot().tasks));
    for (const { event } of readLogs(this.workspace.listArchiveFiles()).events) {
      ids.add(event.task_id);
    }
    if (ids.has(prefix)) return prefix;

    const matches = [...ids].filter((id) => id.toUpperCase().startsWith(needle)).sort();
    if (matches.length === 0) return null;
    if (matches.length > 1) throw new AmbiguousPrefixError(prefix, matches);
    return matches[0];
  }

  /**
   * Every event of a task, archived ones included, in canonical order.
   */
  history(taskId: string): EventEnvelope[] {
    const events = this.eventStore.getByTaskId(taskId);
    if (events.length === 0) throw new TaskNotFoundError(taskId);
    return events;
  }

  isArchived(taskId: string): boolean {
    return readLogs(this.workspace.listArchiveFiles()).events.some(({ event }) => event.task_id === taskId);
  }

  /**
   * Appends one operation after checking it against current state. The new
   * event's seq is one past the highest seq seen for the task.
   */
  apply(input: ApplyInput): EventEnvelope {
    return this.applyTo(this.snapshot(), input);
  }

  createTask(input: CreateTaskInput, ctx?: EventContext): Task {
    const operation: CreateOperation = { type: OperationType.Create, ...input };
    const event = this.apply({ operation, ...ctx });
    return this.get(event.task_id);
  }

  updateField(taskId: string, update: FieldUpdate, ctx?: EventContext): Task {
    const operation: UpdateFieldOperation = { type: OperationType.UpdateField, ...update };
    return this.applyAndGet(taskId, operation, ctx);
  }

  assign(taskId: string, assignee: string, ctx?: EventContext): Task {
    return this.applyAndGet(taskId, { type: OperationType.Assign, assignee }, ctx);
  }

  unassign(taskId: string, ctx?: EventContext): Task {
    return this.applyAndGet(taskId, { type: OperationType.Unassign }, ctx);
  }

  comment(taskId: string, body: string, opts: { ref?: string } & EventContext = {}): Task {
    const { ref, ...ctx } = opts;
    const operation: Operation =
      ref === undefined ? { type: OperationType.Comment, body } : { type: OperationType.Comment, body, ref };
    return this.applyAndGet(taskId, operation, ctx);
  }

  setStream(taskId: string, stream: string | null, ctx?: EventContext): Task {
    return this.applyAndGet(taskId, { type: OperationType.SetStream, stream }, ctx);
  }

  complete(taskId: string, resolution: Resolution, ctx?: EventContext): Task {
    return this.applyAndGet(taskId, { type: OperationType.Complete, resolution }, ctx);
  }

  reopen(taskId: string, opts: { reason?: string } & EventContext = {}): Task {
    const { reason, ...ctx } = opts;
    const operation: Operation =
      reason === undefined ? { type: OperationType.Reopen } : { type: OperationType.Reopen, reason };
    return this.applyAndGet(taskId, operation, ctx);
  }

  /**
   * Links two tasks. `blocks` and `blocked_by` are written on both sides;
   * `parent` is recorded on the child only.
   */
  link(taskId: string, rel: LinkRelation, targetId: string, ctx?: EventContext): EventEnvelope[] {
    return this.writeLink(OperationType.Link, taskId, rel, targetId, ctx);
  }

  unlink(taskId: string, rel: LinkRelation, targetId: string, ctx?: EventContext): EventEnvelope[] {
    return this.writeLink(OperationType.Unlink, taskId, rel, targetId, ctx);
  }

  private writeLink(
    type: OperationType.Link | OperationType.Unlink,
    taskId: string,
    rel: LinkRelation,
    targetId: string,
    ctx?: EventContext
  ): EventEnvelope[] {
    if (taskId === targetId) {
      throw new InvalidLinkError(`Task ${taskId} cannot be linked to itself`);
    }
    const snapshot = this.snapshot();
    if (type === OperationType.Link) {
      this.requireActive(snapshot, targetId);
    }

    const events = [this.applyTo(snapshot, { task_id: taskId, operation: linkOperation(type, rel, targetId), ...ctx })];
    const inverse = INVERSE_RELATION[rel];
    if (inverse && (type === OperationType.Link || findTask(snapshot.tasks, targetId))) {
      events.push(
        this.applyTo(snapshot, { task_id: targetId, operation: linkOperation(type, inverse, taskId), ...ctx })
      );
    }
    return events;
  }

  private applyAndGet(taskId: string, operation: Operation, ctx?: EventContext): Task {
    this.apply({ task_id: taskId, operation, ...ctx });
    return this.get(taskId);
  }

  private requireActive(snapshot: StateSnapshot, taskId: string): Task {
    const task = findTask(snapshot.tasks, taskId);
    if (task) return task;
    if (this.isArchived(taskId)) throw new TaskArchivedError(taskId);
    throw new TaskNotFoundError(taskId);
  }

  private applyTo(snapshot: StateSnapshot, input: ApplyInput): EventEnvelope {
    const author = input.author ?? this.defaults.author;
    const branch = input.branch ?? this.defaults.branch;
    const { operation } = input;

    if (operation.type === OperationType.Create) {
      return this.eventStore.append({ seq: 1, operation, author, branch });
    }

    if (input.task_id === undefined) {
      throw new Error(`task_id is required for ${operation.type} events`);
    }
    const task = this.requireActive(snapshot, input.task_id);

    if (operation.type === OperationType.Complete && task.status === TaskStatus.Complete) {
      throw new InvalidTransitionError(task.task_id, 'complete', task.status);
    }
    if (operation.type === OperationType.Reopen && task.status === TaskStatus.Open) {
      throw new InvalidTransitionError(task.task_id, 'reopen', task.status);
    }

    return this.eventStore.append({
      task_id: task.task_id,
      seq: task.last_seq + 1,
      operation,
      author,
      branch,
    });
  }

  private allTasks(includeArchived: boolean): Task[] {
    if (!includeArchived) return Object.values(this.snapshot().tasks);
    return [...replayWorkspace(this.workspace, { includeArchive: true }).tasks.values()];
  }
}
