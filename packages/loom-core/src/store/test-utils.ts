/**
 * Test utilities for building workspaces on disk and hand-written events.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SCHEMA_VERSION, type EventEnvelope, type OperationPayload } from '../events/types.js';
import { Workspace } from './workspace.js';

export interface TestWorkspace {
  workspace: Workspace;
  tempDir: string;
  cleanup: () => void;
}

/**
 * Creates an initialized workspace under a fresh temp directory.
 */
export function createTestWorkspace(prefix = 'loom-test-'): TestWorkspace {
  const tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
  const workspace = Workspace.init(path.join(tempDir, '.loom'));
  return {
    workspace,
    tempDir,
    cleanup: () => fs.rmSync(tempDir, { recursive: true, force: true }),
  };
}

export interface EventFixture {
  task_id: string;
  seq: number;
  operation: OperationPayload;
  event_id?: string;
  timestamp?: string;
  author?: string;
  branch?: string;
  v?: number;
}

/**
 * Builds an envelope with fixed defaults. The event id defaults to
 * `<task_id>-<seq>` so fixtures stay readable in assertions.
 */
export function makeEvent(fixture: EventFixture): EventEnvelope {
  return {
    v: fixture.v ?? SCHEMA_VERSION,
    event_id: fixture.event_id ?? `${fixture.task_id}-${fixture.seq}`,
    task_id: fixture.task_id,
    seq: fixture.seq,
    timestamp: fixture.timestamp ?? '2026-01-05T10:00:00.000Z',
    author: fixture.author ?? 'tester',
    branch: fixture.branch ?? 'main',
    operation: fixture.operation,
  };
}

/**
 * Writes events (or raw lines) to `events/<name>`, one per line.
 */
export function writeLog(
  workspace: Workspace,
  name: string,
  lines: ReadonlyArray<EventEnvelope | string>,
  kind: 'active' | 'archive' = 'active'
): string {
  const dir = kind === 'active' ? workspace.eventsDir : workspace.archiveDir;
  const filePath = path.join(dir, name);
  const text = lines.map((line) => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n');
  fs.writeFileSync(filePath, lines.length > 0 ? `${text}\n` : '');
  return filePath;
}
