import { z } from 'zod';
import {
  DEFAULT_PRIORITY,
  OperationType,
  PRIORITIES,
  RESOLUTIONS,
  TaskStatus,
  type CreateOperation,
  type EventEnvelope,
  type LinkRelation,
  type Operation,
  type UpdateFieldOperation,
} from '../events/types.js';

const TaskCommentSchema = z.object({
  event_id: z.string(),
  author: z.string(),
  timestamp: z.string(),
  body: z.string(),
  ref: z.string().nullable(),
});

const TaskLinksSchema = z.object({
  blocks: z.array(z.string()),
  blocked_by: z.array(z.string()),
  parent: z.array(z.string()),
});

export const TaskSchema = z.object({
  task_id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  priority: z.enum(PRIORITIES),
  status: z.nativeEnum(TaskStatus),
  resolution: z.enum(RESOLUTIONS).nullable(),
  completed_at: z.string().nullable(),
  assignee: z.string().nullable(),
  tags: z.array(z.string()),
  stream: z.string().nullable(),
  links: TaskLinksSchema,
  comments: z.array(TaskCommentSchema),
  created_at: z.string(),
  created_by: z.string(),
  created_branch: z.string(),
  updated_at: z.string(),
  last_seq: z.number().int(),
});

export const IndexEntrySchema = z.object({
  title: z.string(),
  status: z.nativeEnum(TaskStatus),
  priority: z.enum(PRIORITIES),
  assignee: z.string().nullable(),
  stream: z.string().nullable(),
  updated_at: z.string(),
});

export type Task = z.infer<typeof TaskSchema>;
export type IndexEntry = z.infer<typeof IndexEntrySchema>;
export type TaskComment = z.infer<typeof TaskCommentSchema>;
export type TaskLinks = z.infer<typeof TaskLinksSchema>;

function toSet(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

function withLink(links: TaskLinks, rel: LinkRelation, target: string): TaskLinks {
  return { ...links, [rel]: toSet([...links[rel], target]) };
}

function withoutLink(links: TaskLinks, rel: LinkRelation, target: string): TaskLinks {
  return { ...links, [rel]: links[rel].filter((id) => id !== target) };
}

/**
 * Seeds a task from its `create` event.
 */
export function seedTask(event: EventEnvelope, op: CreateOperation): Task {
  return {
    task_id: event.task_id,
    title: op.title,
    description: op.description ?? null,
    priority: op.priority ?? DEFAULT_PRIORITY,
    status: TaskStatus.Open,
    resolution: null,
    completed_at: null,
    assignee: op.assignee ?? null,
    tags: toSet(op.tags ?? []),
    stream: op.stream ?? null,
    links: { blocks: [], blocked_by: [], parent: [] },
    comments: [],
    created_at: event.timestamp,
    created_by: event.author,
    created_branch: event.branch,
    updated_at: event.timestamp,
    last_seq: event.seq,
  };
}

/**
 * Records that an event was folded without changing any known field.
 */
export function touchTask(task: Task, event: EventEnvelope): Task {
  return { ...task, updated_at: event.timestamp, last_seq: Math.max(task.last_seq, event.seq) };
}

function applyFieldUpdate(task: Task, op: UpdateFieldOperation): Task {
  switch (op.field) {
    case 'title':
      return { ...task, title: op.value };
    case 'description':
      return { ...task, description: op.value };
    case 'priority':
      return { ...task, priority: op.value };
    case 'tags':
      return { ...task, tags: toSet(op.value) };
  }
}

/**
 * Pure state transition: returns a new task with only the fields named by
 * `op` changed. Callers feed events in canonical order.
 */
export function applyOperation(task: Task, event: EventEnvelope, op: Operation): Task {
  const next = touchTask(task, event);

  switch (op.type) {
    case OperationType.Create:
      // Identity is fixed by the first create; the replay engine reports repeats.
      return next;
    case OperationType.UpdateField:
      return applyFieldUpdate(next, op);
    case OperationType.Assign:
      return { ...next, assignee: op.assignee };
    case OperationType.Unassign:
      return { ...next, assignee: null };
    case OperationType.Comment:
      return {
        ...next,
        comments: [
          ...next.comments,
          {
            event_id: event.event_id,
            author: event.author,
            timestamp: event.timestamp,
            body: op.body,
            ref: op.ref ?? null,
          },
        ],
      };
    case OperationType.Link:
      return { ...next, links: withLink(next.links, op.rel, op.target) };
    case OperationType.Unlink:
      return { ...next, links: withoutLink(next.links, op.rel, op.target) };
    case OperationType.SetStream:
      return { ...next, stream: op.stream };
    case OperationType.Complete:
      return {
        ...next,
        status: TaskStatus.Complete,
        resolution: op.resolution,
        completed_at: event.timestamp,
      };
    case OperationType.Reopen:
      return { ...next, status: TaskStatus.Open, resolution: null, completed_at: null };
  }
}

/**
 * Looks a task up by id among own keys only, so ids such as `constructor`
 * never resolve to inherited members.
 */
export function findTask(tasks: Readonly<Record<string, Task>>, taskId: string): Task | null {
  return Object.hasOwn(tasks, taskId) ? tasks[taskId] : null;
}

export function toIndexEntry(task: Task): IndexEntry {
  return {
    title: task.title,
    status: task.status,
    priority: task.priority,
    assignee: task.assignee,
    stream: task.stream,
    updated_at: task.updated_at,
  };
}
