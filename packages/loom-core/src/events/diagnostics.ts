import { z } from 'zod';

export enum DiagnosticKind {
  ParseError = 'parse_error',
  InvalidEvent = 'invalid_event',
  DuplicateEventId = 'duplicate_event_id',
  DuplicateSeq = 'duplicate_seq',
  NonMonotonicSeq = 'non_monotonic_seq',
  DuplicateCreate = 'duplicate_create',
  OrphanEvent = 'orphan_event',
  AsymmetricLink = 'asymmetric_link',
  DanglingLink = 'dangling_link',
  UnknownOperation = 'unknown_operation',
  UnsupportedVersion = 'unsupported_version',
  ResolutionConflict = 'resolution_conflict',
}

export type DiagnosticSeverity = 'error' | 'warning' | 'conflict';

export const DIAGNOSTIC_SEVERITY: Record<DiagnosticKind, DiagnosticSeverity> = {
  [DiagnosticKind.ParseError]: 'error',
  [DiagnosticKind.InvalidEvent]: 'error',
  [DiagnosticKind.DuplicateEventId]: 'error',
  [DiagnosticKind.DuplicateSeq]: 'error',
  [DiagnosticKind.NonMonotonicSeq]: 'error',
  [DiagnosticKind.DuplicateCreate]: 'error',
  [DiagnosticKind.OrphanEvent]: 'warning',
  [DiagnosticKind.AsymmetricLink]: 'warning',
  [DiagnosticKind.DanglingLink]: 'warning',
  [DiagnosticKind.UnknownOperation]: 'warning',
  [DiagnosticKind.UnsupportedVersion]: 'warning',
  [DiagnosticKind.ResolutionConflict]: 'conflict',
};

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  message: string;
  /** Log file relative to the workspace root, e.g. `events/2026-10-19.jsonl`. */
  file?: string;
  /** 1-based line number within `file`. */
  line?: number;
  task_id?: string;
  event_id?: string;
}

export const DiagnosticSchema = z.object({
  kind: z.nativeEnum(DiagnosticKind),
  severity: z.enum(['error', 'warning', 'conflict']),
  message: z.string(),
  file: z.string().optional(),
  line: z.number().int().optional(),
  task_id: z.string().optional(),
  event_id: z.string().optional(),
});

export type DiagnosticContext = Omit<Diagnostic, 'kind' | 'severity' | 'message'>;

export function createDiagnostic(
  kind: DiagnosticKind,
  message: string,
  context: DiagnosticContext = {}
): Diagnostic {
  return { kind, severity: DIAGNOSTIC_SEVERITY[kind], message, ...context };
}

export function formatLocation(diagnostic: Pick<Diagnostic, 'file' | 'line'>): string {
  if (!diagnostic.file) return '';
  return diagnostic.line === undefined ? diagnostic.file : `${diagnostic.file}:${diagnostic.line}`;
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileA = a.file ?? '\uffff';
  const fileB = b.file ?? '\uffff';
  if (fileA !== fileB) return fileA < fileB ? -1 : 1;
  const lineA = a.line ?? 0;
  const lineB = b.line ?? 0;
  if (lineA !== lineB) return lineA - lineB;
  const taskA = a.task_id ?? '';
  const taskB = b.task_id ?? '';
  if (taskA !== taskB) return taskA < taskB ? -1 : 1;
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  return a.message < b.message ? -1 : a.message > b.message ? 1 : 0;
}
