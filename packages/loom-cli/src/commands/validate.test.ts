import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { DiagnosticKind } from 'loom-core';
import { runValidate } from './validate.js';
import { createTestServices, type TestServices } from '../test-utils.js';

describe('runValidate', () => {
  let ctx: TestServices;

  beforeEach(() => {
    ctx = createTestServices('loom-validate-test-');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.cleanup();
  });

  it('passes a workspace written through the service', () => {
    const { taskService } = ctx.services;
    const a = taskService.createTask({ title: 'A' });
    const b = taskService.createTask({ title: 'B' });
    taskService.link(a.task_id, 'blocks', b.task_id);

    const result = runValidate({ services: ctx.services, json: false });
    expect(result).toMatchObject({ valid: true, files: 1, events: 4, errors: 0, warnings: 0, conflicts: 0 });
    expect(console.log).toHaveBeenCalledWith('✓ 1 file(s), 4 event(s): 0 error(s), 0 warning(s), 0 conflict(s)');
  });

  it('reports a malformed line with its location', () => {
    const { taskService, workspace } = ctx.services;
    taskService.createTask({ title: 'A' });
    fs.appendFileSync(path.join(workspace.eventsDir, '2026-03-14.jsonl'), 'not json\n');

    const result = runValidate({ services: ctx.services, json: false });
    expect(result.valid).toBe(false);
    expect(result.errors).toBe(1);
    expect(result.diagnostics[0]).toMatchObject({
      kind: DiagnosticKind.ParseError,
      file: 'events/2026-03-14.jsonl',
      line: 2,
    });
  });

  it('prints the result as JSON in json mode', () => {
    const result = runValidate({ services: ctx.services, json: true });
    expect(console.log).toHaveBeenCalledWith(JSON.stringify(result));
    expect(result.files).toBe(0);
  });
});
