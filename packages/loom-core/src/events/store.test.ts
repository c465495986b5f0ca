import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import { EventStore } from './store.js';
import { OperationType, SCHEMA_VERSION } from './types.js';
import { replayWorkspace } from '../projections/replay.js';
import { createTestWorkspace, makeEvent, writeLog, type TestWorkspace } from '../store/test-utils.js';

describe('EventStore', () => {
  let ctx: TestWorkspace;
  let store: EventStore;

  beforeEach(() => {
    ctx = createTestWorkspace();
    store = new EventStore(ctx.workspace, { clock: () => new Date('2026-03-14T09:30:00.000Z') });
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('append', () => {
    it('writes one line to the file of the event day', () => {
      const event = store.append({
        seq: 1,
        operation: { type: OperationType.Create, title: 'Write docs' },
        author: 'alice',
        branch: 'main',
      });

      expect(event.v).toBe(SCHEMA_VERSION);
      expect(event.task_id).toBe(event.event_id);
      expect(event.timestamp).toBe('2026-03-14T09:30:00.000Z');

      const text = fs.readFileSync(path.join(ctx.workspace.eventsDir, '2026-03-14.jsonl'), 'utf-8');
      expect(text).toBe(`${JSON.stringify(event)}\n`);
    });

    it('appends after existing lines without rewriting them', () => {
      const first = store.append({
        seq: 1,
        operation: { type: OperationType.Create, title: 'One' },
        author: 'alice',
        branch: 'main',
      });
      const second = store.append({
        task_id: first.task_id,
        seq: 2,
        operation: { type: OperationType.Assign, assignee: 'bob' },
        author: 'alice',
        branch: 'main',
      });

      const text = fs.readFileSync(path.join(ctx.workspace.eventsDir, '2026-03-14.jsonl'), 'utf-8');
      expect(text).toBe(`${JSON.stringify(first)}\n${JSON.stringify(second)}\n`);
    });

    it('starts a new line after a torn final record', () => {
      const filePath = path.join(ctx.workspace.eventsDir, '2026-03-14.jsonl');
      fs.writeFileSync(filePath, '{"v":1,"event_id":"torn');

      const event = store.append({
        seq: 1,
        operation: { type: OperationType.Create, title: 'After crash' },
        author: 'alice',
        branch: 'main',
      });

      const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
      expect(lines).toEqual(['{"v":1,"event_id":"torn', JSON.stringify(event), '']);
    });

    it('requires task_id for anything but create', () => {
      expect(() =>
        store.append({
          seq: 2,
          operation: { type: OperationType.Unassign },
          author: 'alice',
          branch: 'main',
        })
      ).toThrow('task_id is required for unassign events');
    });

    it('rejects invalid operations before touching the log', () => {
      expect(() =>
        store.append({
          task_id: 'T1',
          seq: 2,
          operation: { type: OperationType.Comment, body: '' },
          author: 'alice',
          branch: 'main',
        })
      ).toThrow(ZodError);
      expect(ctx.workspace.listEventFiles()).toEqual([]);
    });
  });

  describe('getByTaskId', () => {
    it('merges archive and active logs in canonical order without duplicates', () => {
      const create = makeEvent({ task_id: 'T1', seq: 1, operation: { type: 'create', title: 'A' } });
      const assign = makeEvent({ task_id: 'T1', seq: 2, operation: { type: 'assign', assignee: 'bob' } });
      const other = makeEvent({ task_id: 'T2', seq: 1, operation: { type: 'create', title: 'B' } });
      writeLog(ctx.workspace, '2026-01.jsonl', [assign], 'archive');
      writeLog(ctx.workspace, '2026-01-05.jsonl', [assign, other, create]);

      expect(store.getByTaskId('T1').map((e) => e.event_id)).toEqual(['T1-1', 'T1-2']);
    });

    it('keeps the same copy of a duplicated event id as replay does', () => {
      const create = makeEvent({ task_id: 'T1', seq: 1, operation: { type: 'create', title: 'A' } });
      const toZed = makeEvent({ task_id: 'T1', seq: 2, operation: { type: 'assign', assignee: 'zed' } });
      const toBob = makeEvent({ task_id: 'T1', seq: 2, operation: { type: 'assign', assignee: 'bob' } });
      writeLog(ctx.workspace, '2026-01.jsonl', [create, toZed], 'archive');
      writeLog(ctx.workspace, '2026-01-05.jsonl', [toBob]);

      const history = store.getByTaskId('T1');
      expect(history.map((e) => e.event_id)).toEqual(['T1-1', 'T1-2']);
      expect(history[1].operation).toEqual({ type: 'assign', assignee: 'bob' });
      expect(replayWorkspace(ctx.workspace, { includeArchive: true }).tasks.get('T1')?.assignee).toBe('bob');
    });

    it('returns an empty list for unknown tasks', () => {
      expect(store.getByTaskId('missing')).toEqual([]);
    });
  });
});
