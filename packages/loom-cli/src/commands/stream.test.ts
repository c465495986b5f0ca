import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runAssign, runUnassign } from './assign.js';
import { runComment } from './comment.js';
import { runStream } from './stream.js';
import { createTestServices, type TestServices } from '../test-utils.js';

describe('single-field commands', () => {
  let ctx: TestServices;

  beforeEach(() => {
    ctx = createTestServices('loom-stream-test-');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.cleanup();
  });

  it('sets and clears the stream', () => {
    const task = ctx.services.taskService.createTask({ title: 'Queue work' });
    expect(runStream({ services: ctx.services, taskId: task.task_id, stream: 'infra', json: false }).stream).toBe(
      'infra'
    );
    expect(runStream({ services: ctx.services, taskId: task.task_id, stream: null, json: false }).stream).toBeNull();
    expect(console.log).toHaveBeenLastCalledWith(`✓ Cleared stream of ${task.task_id}`);
  });

  it('assigns and unassigns', () => {
    const task = ctx.services.taskService.createTask({ title: 'Queue work' });
    expect(runAssign({ services: ctx.services, taskId: task.task_id, assignee: 'dana', json: false }).assignee).toBe(
      'dana'
    );
    expect(runUnassign({ services: ctx.services, taskId: task.task_id, json: false }).assignee).toBeNull();
  });

  it('appends comments in order', () => {
    const task = ctx.services.taskService.createTask({ title: 'Queue work' });
    runComment({ services: ctx.services, taskId: task.task_id, body: 'first', json: false });
    const updated = runComment({ services: ctx.services, taskId: task.task_id, body: 'second', json: false });
    expect(updated.comments.map((c) => [c.body, c.ref])).toEqual([
      ['first', null],
      ['second', null],
    ]);
  });
});
