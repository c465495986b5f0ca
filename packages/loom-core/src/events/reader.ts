import fs from 'fs';
import type { LogFile, LogKind } from '../store/workspace.js';
import { createDiagnostic, DiagnosticKind, type Diagnostic } from './diagnostics.js';
import { EventEnvelopeSchema, formatIssues, type EventEnvelope } from './types.js';

export interface EventSource {
  file: string;
  kind: LogKind;
  line: number;
}

export interface LocatedEvent {
  event: EventEnvelope;
  source: EventSource;
  /** The line exactly as stored, without the trailing newline. */
  raw: string;
}

export interface LogReadResult {
  events: LocatedEvent[];
  diagnostics: Diagnostic[];
}

export function sourceName(file: Pick<LogFile, 'kind' | 'name'>): string {
  return `${file.kind === 'active' ? 'events' : 'archive'}/${file.name}`;
}

export function splitLines(text: string): string[] {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Parses every line independently. A line that is not JSON or does not match
 * the envelope schema becomes a diagnostic; it never stops the read.
 */
export function parseLogText(text: string, origin: { file: string; kind: LogKind }): LogReadResult {
  const events: LocatedEvent[] = [];
  const diagnostics: Diagnostic[] = [];

  splitLines(text).forEach((raw, index) => {
    const line = index + 1;
    if (raw.trim() === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      diagnostics.push(
        createDiagnostic(DiagnosticKind.ParseError, `Invalid JSON: ${reason}`, { file: origin.file, line })
      );
      return;
    }

    const result = EventEnvelopeSchema.safeParse(parsed);
    if (!result.success) {
      diagnostics.push(
        createDiagnostic(DiagnosticKind.InvalidEvent, `Invalid event: ${formatIssues(result.error)}`, {
          file: origin.file,
          line,
          ...identityOf(parsed),
        })
      );
      return;
    }

    events.push({ event: result.data, source: { file: origin.file, kind: origin.kind, line }, raw });
  });

  return { events, diagnostics };
}

export function readLogFile(file: LogFile): LogReadResult {
  const text = fs.readFileSync(file.path, 'utf-8');
  return parseLogText(text, { file: sourceName(file), kind: file.kind });
}

export function readLogs(files: readonly LogFile[]): LogReadResult {
  const events: LocatedEvent[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const file of files) {
    const result = readLogFile(file);
    events.push(...result.events);
    diagnostics.push(...result.diagnostics);
  }
  return { events, diagnostics };
}

function identityOf(value: unknown): { task_id?: string; event_id?: string } {
  if (typeof value !== 'object' || value === null) return {};
  const identity: { task_id?: string; event_id?: string } = {};
  if ('task_id' in value && typeof value.task_id === 'string') identity.task_id = value.task_id;
  if ('event_id' in value && typeof value.event_id === 'string') identity.event_id = value.event_id;
  return identity;
}
