import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { ArchiveBlockedError } from 'loom-core';
import { CLIError } from '../errors.js';
import { resolveCutoff, runArchive } from './archive.js';
import { createTestServices, type TestServices } from '../test-utils.js';

describe('resolveCutoff', () => {
  const now = new Date('2026-05-31T12:00:00.000Z');

  it('reads --before as a date', () => {
    expect(resolveCutoff({ before: '2026-05-01' }, 30, now).toISOString()).toBe('2026-05-01T00:00:00.000Z');
  });

  it('counts --days back from now', () => {
    expect(resolveCutoff({ days: '10' }, 30, now).toISOString()).toBe('2026-05-21T12:00:00.000Z');
  });

  it('falls back to the configured age', () => {
    expect(resolveCutoff({}, 30, now).toISOString()).toBe('2026-05-01T12:00:00.000Z');
  });

  it('rejects both options together', () => {
    expect(() => resolveCutoff({ before: '2026-05-01', days: '3' }, 30, now)).toThrow(CLIError);
  });
});

describe('runArchive', () => {
  let ctx: TestServices;

  beforeEach(() => {
    ctx = createTestServices('loom-archive-test-');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.cleanup();
  });

  it('reports without moving anything on a dry run', () => {
    const { taskService, workspace } = ctx.services;
    const task = taskService.createTask({ title: 'Old' });
    taskService.complete(task.task_id, 'done');

    const result = runArchive({
      services: ctx.services,
      before: new Date('2026-04-01T00:00:00.000Z'),
      dryRun: true,
      json: false,
    });
    expect(result).toEqual({ count: 1, task_ids: [task.task_id], months: ['2026-03'], dry_run: true });
    expect(workspace.listArchiveFiles()).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('Would archive 1 task(s) into 2026-03:');
  });

  it('moves completed histories and leaves open tasks', () => {
    const { taskService, workspace } = ctx.services;
    const done = taskService.createTask({ title: 'Old' });
    taskService.complete(done.task_id, 'done');
    const open = taskService.createTask({ title: 'Still open' });

    const result = runArchive({ services: ctx.services, before: new Date('2026-04-01T00:00:00.000Z'), json: false });
    expect(result.task_ids).toEqual([done.task_id]);

    const archived = fs.readFileSync(path.join(workspace.archiveDir, '2026-03.jsonl'), 'utf-8');
    expect(archived.trim().split('\n')).toHaveLength(2);
    expect(taskService.list().map((t) => t.task_id)).toEqual([open.task_id]);
  });

  it('keeps tasks completed at or after the cutoff', () => {
    const { taskService } = ctx.services;
    const task = taskService.createTask({ title: 'Recent' });
    taskService.complete(task.task_id, 'done');

    const result = runArchive({ services: ctx.services, before: new Date('2026-03-14T09:01:00.000Z'), json: false });
    expect(result.count).toBe(0);
    expect(console.log).toHaveBeenCalledWith('No completed tasks before 2026-03-14T09:01:00.000Z');
  });

  it('refuses while an active log has unreadable lines', () => {
    const { taskService, workspace } = ctx.services;
    const task = taskService.createTask({ title: 'Old' });
    taskService.complete(task.task_id, 'done');
    fs.appendFileSync(path.join(workspace.eventsDir, '2026-03-14.jsonl'), '{"truncated\n');

    expect(() =>
      runArchive({ services: ctx.services, before: new Date('2026-04-01T00:00:00.000Z'), json: false })
    ).toThrow(ArchiveBlockedError);
  });
});
