import fs from 'fs';
import { z } from 'zod';
import { DiagnosticSchema, type Diagnostic } from '../events/diagnostics.js';
import { IndexEntrySchema, TaskSchema, toIndexEntry, type IndexEntry, type Task } from '../projections/task-state.js';
import type { Workspace } from '../store/workspace.js';
import { writeFileAtomic } from '../utils/fs.js';

export const CACHE_FORMAT = 1;

/**
 * A string-keyed record whose keys all become own properties, `__proto__`
 * included. Task ids come from log files and may be any string.
 */
function ownRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z.unknown().transform((raw, ctx): Record<string, T> => {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an object' });
      return z.NEVER;
    }
    const entries: Array<[string, T]> = [];
    for (const [key, value] of Object.entries(raw)) {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid entry ${key}`, path: [key] });
        return z.NEVER;
      }
      entries.push([key, parsed.data]);
    }
    return Object.fromEntries(entries);
  });
}

const IndexFileSchema = z.object({
  format: z.literal(CACHE_FORMAT),
  fingerprint: z.string(),
  tasks: ownRecord(IndexEntrySchema),
});

const StateFileSchema = z.object({
  format: z.literal(CACHE_FORMAT),
  fingerprint: z.string(),
  event_count: z.number().int(),
  tasks: ownRecord(TaskSchema),
  diagnostics: z.array(DiagnosticSchema),
});

/**
 * Materialized state of the active logs, tagged with the fingerprint of the
 * files it was built from.
 */
export interface StateSnapshot {
  fingerprint: string;
  eventCount: number;
  tasks: Record<string, Task>;
  diagnostics: Diagnostic[];
}

function sortedRecord<T>(record: Record<string, T>): Record<string, T> {
  return Object.fromEntries(Object.keys(record).sort().map((key): [string, T] => [key, record[key]]));
}

function serialize(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch {
    return undefined;
  }
}

/**
 * The two derived files, `.index.json` and `.state.json`. Both are
 * disposable: anything missing, unreadable or out of step reads as absent.
 */
export class StateCache {
  constructor(private workspace: Workspace) {}

  load(): StateSnapshot | null {
    const state = StateFileSchema.safeParse(readJson(this.workspace.statePath));
    const index = IndexFileSchema.safeParse(readJson(this.workspace.indexPath));
    if (!state.success || !index.success) return null;
    if (state.data.fingerprint !== index.data.fingerprint) return null;

    return {
      fingerprint: state.data.fingerprint,
      eventCount: state.data.event_count,
      tasks: state.data.tasks,
      diagnostics: state.data.diagnostics,
    };
  }

  /**
   * Writes both files. Output depends only on the snapshot, so rebuilding
   * from the same logs yields byte-identical files.
   */
  save(snapshot: StateSnapshot): void {
    const tasks = sortedRecord(snapshot.tasks);
    const index = Object.fromEntries(
      Object.entries(tasks).map(([taskId, task]): [string, IndexEntry] => [taskId, toIndexEntry(task)])
    );

    writeFileAtomic(
      this.workspace.statePath,
      serialize({
        format: CACHE_FORMAT,
        fingerprint: snapshot.fingerprint,
        event_count: snapshot.eventCount,
        tasks,
        diagnostics: snapshot.diagnostics,
      })
    );
    writeFileAtomic(
      this.workspace.indexPath,
      serialize({ format: CACHE_FORMAT, fingerprint: snapshot.fingerprint, tasks: index })
    );
  }

  clear(): void {
    fs.rmSync(this.workspace.statePath, { force: true });
    fs.rmSync(this.workspace.indexPath, { force: true });
  }
}
