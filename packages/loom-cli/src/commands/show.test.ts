import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TaskArchivedError, TaskNotFoundError } from 'loom-core';
import { runShow } from './show.js';
import { createTestServices, type TestServices } from '../test-utils.js';

describe('runShow', () => {
  let ctx: TestServices;

  beforeEach(() => {
    ctx = createTestServices('loom-show-test-');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.cleanup();
  });

  it('returns the folded task with comments', () => {
    const { taskService } = ctx.services;
    const task = taskService.createTask({ title: 'Fix login' });
    taskService.comment(task.task_id, 'Repro on staging', { ref: 'abc123' });

    const result = runShow({ services: ctx.services, taskId: task.task_id, json: false });
    expect(result.archived).toBe(false);
    expect(result.task.comments).toEqual([
      {
        event_id: expect.any(String),
        author: 'tester',
        timestamp: '2026-03-14T09:01:00.000Z',
        body: 'Repro on staging',
        ref: 'abc123',
      },
    ]);
    expect(console.log).toHaveBeenCalledWith('  [2026-03-14T09:01:00.000Z] tester [abc123]: Repro on staging');
  });

  it('throws for unknown tasks', () => {
    expect(() => runShow({ services: ctx.services, taskId: '01NOPE', json: false })).toThrow(TaskNotFoundError);
  });

  it('shows archived tasks only when asked', () => {
    const { taskService, archiveService } = ctx.services;
    const task = taskService.createTask({ title: 'Old work' });
    taskService.complete(task.task_id, 'done');
    archiveService.archive({ before: new Date('2026-04-01T00:00:00.000Z') });

    expect(() => runShow({ services: ctx.services, taskId: task.task_id, json: false })).toThrow(TaskArchivedError);

    const result = runShow({ services: ctx.services, taskId: task.task_id, includeArchived: true, json: false });
    expect(result.archived).toBe(true);
    expect(result.task.status).toBe('complete');
    expect(console.log).toHaveBeenCalledWith(`Task: ${task.task_id} (archived)`);
  });
});
