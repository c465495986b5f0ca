import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ValidationService } from './validation-service.js';
import { DiagnosticKind } from '../events/diagnostics.js';
import { replayWorkspace } from '../projections/replay.js';
import { createTestWorkspace, makeEvent, writeLog, type TestWorkspace } from '../store/test-utils.js';

const create = (taskId: string) => makeEvent({ task_id: taskId, seq: 1, operation: { type: 'create', title: taskId } });

describe('ValidationService', () => {
  let ctx: TestWorkspace;
  let validationService: ValidationService;

  beforeEach(() => {
    ctx = createTestWorkspace();
    validationService = new ValidationService(ctx.workspace);
  });

  afterEach(() => {
    ctx.cleanup();
  });

  const kinds = () => validationService.validate().diagnostics.map((d) => d.kind);

  it('accepts a clean workspace', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      create('B'),
      makeEvent({ task_id: 'A', seq: 2, operation: { type: 'link', rel: 'blocks', target: 'B' } }),
      makeEvent({ task_id: 'B', seq: 2, operation: { type: 'link', rel: 'blocked_by', target: 'A' } }),
    ]);

    expect(validationService.validate()).toEqual({
      valid: true,
      files: 1,
      events: 4,
      errors: 0,
      warnings: 0,
      conflicts: 0,
      diagnostics: [],
    });
  });

  it('reports parse errors with their location', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [create('A'), 'not json']);
    const result = validationService.validate();

    expect(result.valid).toBe(false);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      kind: DiagnosticKind.ParseError,
      severity: 'error',
      file: 'events/2026-01-05.jsonl',
      line: 2,
    });
  });

  it('reports duplicate event ids across files', () => {
    writeLog(ctx.workspace, '2026-01.jsonl', [create('A')], 'archive');
    writeLog(ctx.workspace, '2026-01-05.jsonl', [create('A')]);
    const result = validationService.validate();

    expect(result.diagnostics.map((d) => d.kind)).toEqual([DiagnosticKind.DuplicateEventId]);
    expect(result.diagnostics[0].file).toBe('events/2026-01-05.jsonl');
    expect(result.diagnostics[0].message).toBe('Event A-1 already appears at archive/2026-01.jsonl:1');
  });

  it('reports duplicate seq on the same branch only', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      makeEvent({ task_id: 'A', seq: 2, event_id: 'x', operation: { type: 'assign', assignee: 'bob' } }),
      makeEvent({ task_id: 'A', seq: 2, event_id: 'y', operation: { type: 'assign', assignee: 'eve' } }),
      makeEvent({
        task_id: 'A',
        seq: 2,
        event_id: 'z',
        branch: 'feature',
        operation: { type: 'assign', assignee: 'dan' },
      }),
    ]);

    const result = validationService.validate();
    expect(result.diagnostics.map((d) => [d.kind, d.event_id])).toEqual([[DiagnosticKind.DuplicateSeq, 'y']]);
  });

  it('reports seq going down within one file', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      makeEvent({ task_id: 'A', seq: 3, operation: { type: 'unassign' } }),
      makeEvent({ task_id: 'A', seq: 2, operation: { type: 'assign', assignee: 'bob' } }),
    ]);

    const result = validationService.validate();
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ kind: DiagnosticKind.NonMonotonicSeq, line: 3 });
  });

  it('does not compare seq across files', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      makeEvent({ task_id: 'A', seq: 3, operation: { type: 'unassign' } }),
    ]);
    writeLog(ctx.workspace, '2026-01-06.jsonl', [
      makeEvent({ task_id: 'A', seq: 2, operation: { type: 'assign', assignee: 'bob' } }),
    ]);

    expect(kinds()).toEqual([]);
  });

  it('reports duplicate creates, orphans and invalid operations', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      makeEvent({ task_id: 'A', seq: 2, event_id: 'again', operation: { type: 'create', title: 'Again' } }),
      makeEvent({ task_id: 'ghost', seq: 2, operation: { type: 'unassign' } }),
      makeEvent({ task_id: 'A', seq: 3, operation: { type: 'complete', resolution: 'later' } }),
    ]);

    const result = validationService.validate();
    expect(result.diagnostics.map((d) => [d.kind, d.severity, d.line])).toEqual([
      [DiagnosticKind.DuplicateCreate, 'error', 2],
      [DiagnosticKind.OrphanEvent, 'warning', 3],
      [DiagnosticKind.InvalidEvent, 'error', 4],
    ]);
    expect(result.errors).toBe(2);
    expect(result.warnings).toBe(1);
  });

  it('warns about unknown operations and newer versions', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      makeEvent({ task_id: 'A', seq: 2, v: 2, operation: { type: 'set_estimate', hours: 3 } }),
    ]);

    const result = validationService.validate();
    expect(result.valid).toBe(true);
    expect(result.diagnostics.map((d) => d.kind).sort()).toEqual([
      DiagnosticKind.UnknownOperation,
      DiagnosticKind.UnsupportedVersion,
    ]);
    expect(validationService.validate({ strict: true }).valid).toBe(false);
  });

  it('reports asymmetric and dangling links as warnings', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      create('B'),
      makeEvent({ task_id: 'A', seq: 2, operation: { type: 'link', rel: 'blocks', target: 'B' } }),
      makeEvent({ task_id: 'A', seq: 3, operation: { type: 'link', rel: 'parent', target: 'gone' } }),
    ]);

    const result = validationService.validate();
    expect(result.valid).toBe(true);
    expect(result.diagnostics.map((d) => [d.kind, d.task_id])).toEqual([
      [DiagnosticKind.AsymmetricLink, 'A'],
      [DiagnosticKind.DanglingLink, 'A'],
    ]);
  });

  it('reports exactly one conflict for diverging completions on two branches', () => {
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      create('A'),
      makeEvent({
        task_id: 'A',
        seq: 2,
        event_id: 'main-done',
        branch: 'main',
        timestamp: '2026-01-05T11:00:00.000Z',
        operation: { type: 'complete', resolution: 'done' },
      }),
      makeEvent({
        task_id: 'A',
        seq: 2,
        event_id: 'feature-wontfix',
        branch: 'feature',
        timestamp: '2026-01-05T12:00:00.000Z',
        operation: { type: 'complete', resolution: 'wontfix' },
      }),
    ]);

    const result = validationService.validate();
    expect(result.valid).toBe(true);
    expect(result.conflicts).toBe(1);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      kind: DiagnosticKind.ResolutionConflict,
      severity: 'conflict',
      task_id: 'A',
      event_id: 'feature-wontfix',
    });

    const task = replayWorkspace(ctx.workspace).tasks.get('A');
    expect(task?.status).toBe('complete');
    expect(task?.resolution).toBe('wontfix');
    expect(task?.completed_at).toBe('2026-01-05T12:00:00.000Z');
  });

  it('checks archived logs too', () => {
    writeLog(ctx.workspace, '2026-01.jsonl', ['{broken'], 'archive');
    expect(kinds()).toEqual([DiagnosticKind.ParseError]);
  });
});
