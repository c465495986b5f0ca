import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { StateCache } from '../cache/state-cache.js';
import { DiagnosticKind, type Diagnostic } from '../events/diagnostics.js';
import { sortCanonical } from '../events/ordering.js';
import { parseLogText, readLogs, sourceName, type LocatedEvent } from '../events/reader.js';
import { TaskStatus } from '../events/types.js';
import { dedupeEvents, replayEvents } from '../projections/replay.js';
import type { Task } from '../projections/task-state.js';
import type { LogFile, Workspace } from '../store/workspace.js';
import { monthKey } from '../utils/dates.js';
import { tempPathFor, writeFileAtomic, writeFileDurable } from '../utils/fs.js';

export class ArchiveBlockedError extends Error {
  constructor(public readonly diagnostics: Diagnostic[]) {
    super(
      `Cannot archive while active logs contain unreadable lines (${diagnostics.length}). Run 'loom validate' for details.`
    );
    this.name = 'ArchiveBlockedError';
  }
}

export class ArchiveConflictError extends Error {
  constructor(public readonly files: string[]) {
    super(`Log files changed while archiving: ${files.join(', ')}. Nothing was moved; run the archive again.`);
    this.name = 'ArchiveConflictError';
  }
}

export interface ArchiveOptions {
  /** Completed tasks whose completed_at is strictly earlier are archived. */
  before: Date;
  dryRun?: boolean;
}

export interface ArchiveResult {
  count: number;
  task_ids: string[];
  months: string[];
  dry_run: boolean;
}

const JournalOperationSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('replace'), target: z.string(), temp: z.string() }),
  z.object({ action: z.literal('remove'), target: z.string() }),
]);

const JournalSchema = z.object({
  version: z.literal(1),
  operations: z.array(JournalOperationSchema),
});

type JournalOperation = z.infer<typeof JournalOperationSchema>;
type Journal = z.infer<typeof JournalSchema>;

interface ActiveFile {
  file: LogFile;
  text: string;
  /** Raw lines split on LF only, so kept lines are written back byte for byte. */
  lines: string[];
  events: LocatedEvent[];
}

export interface PlannedWrite {
  target: string;
  content: string | null;
  /** Target content the plan was computed from; null when the file did not exist. */
  expected: string | null;
}

function rawLines(text: string): string[] {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function withTrailingNewline(text: string): string {
  return text === '' || text.endsWith('\n') ? text : `${text}\n`;
}

function readIfExists(filePath: string): string | null {
  return fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf-8') : null;
}

function compareCompletion(a: Task, b: Task): number {
  const left = a.completed_at ?? '';
  const right = b.completed_at ?? '';
  if (left !== right) return left < right ? -1 : 1;
  return a.task_id < b.task_id ? -1 : a.task_id > b.task_id ? 1 : 0;
}

/**
 * Moves the histories of completed tasks from `events/` into
 * `archive/<YYYY-MM>.jsonl`.
 *
 * All new file contents are first written to temp files. A journal listing
 * the renames and removals is then written atomically; from that point the
 * archival is committed and `recover()` finishes it after a crash.
 */
export class ArchiveService {
  constructor(
    private workspace: Workspace,
    private cache: StateCache
  ) {}

  archive(opts: ArchiveOptions): ArchiveResult {
    this.recover();

    const dryRun = opts.dryRun ?? false;
    const active = this.readActiveFiles();
    const readDiagnostics = active.flatMap((entry) => entry.diagnostics);
    const unreadable = readDiagnostics.filter(
      (d) => d.kind === DiagnosticKind.ParseError || d.kind === DiagnosticKind.InvalidEvent
    );
    if (unreadable.length > 0) {
      throw new ArchiveBlockedError(unreadable);
    }

    const allEvents = active.flatMap((entry) => entry.events);
    const { tasks } = replayEvents(allEvents);
    const cutoff = opts.before.getTime();
    const selected = [...tasks.values()]
      .filter(
        (task) =>
          task.status === TaskStatus.Complete &&
          task.completed_at !== null &&
          Date.parse(task.completed_at) < cutoff
      )
      .sort(compareCompletion);

    const selectedIds = new Set(selected.map((task) => task.task_id));
    const byMonth = new Map<string, Task[]>();
    for (const task of selected) {
      const month = monthKey(task.completed_at ?? task.updated_at);
      const group = byMonth.get(month);
      if (group) group.push(task);
      else byMonth.set(month, [task]);
    }
    const months = [...byMonth.keys()].sort();

    const result: ArchiveResult = {
      count: selected.length,
      task_ids: selected.map((task) => task.task_id),
      months,
      dry_run: dryRun,
    };
    if (dryRun || selected.length === 0) return result;

    const writes: PlannedWrite[] = [
      ...this.planArchiveWrites(byMonth, allEvents),
      ...this.planActiveWrites(active, selectedIds),
    ];
    this.commit(writes);
    this.cache.clear();
    return result;
  }

  /**
   * Finishes an interrupted archival if its journal exists; otherwise removes
   * temp files left by one that never committed. Returns true when a journal
   * was replayed.
   */
  recover(): boolean {
    if (!fs.existsSync(this.workspace.journalPath)) {
      this.removeStrayTemps();
      return false;
    }

    const parsed = JournalSchema.parse(JSON.parse(fs.readFileSync(this.workspace.journalPath, 'utf-8')));
    this.applyJournal(parsed);
    this.cache.clear();
    return true;
  }

  private readActiveFiles(): Array<ActiveFile & { diagnostics: Diagnostic[] }> {
    return this.workspace.listEventFiles().map((file) => {
      const text = fs.readFileSync(file.path, 'utf-8');
      const { events, diagnostics } = parseLogText(text, { file: sourceName(file), kind: file.kind });
      return { file, text, lines: rawLines(text), events, diagnostics };
    });
  }

  private planArchiveWrites(byMonth: Map<string, Task[]>, allEvents: LocatedEvent[]): PlannedWrite[] {
    const archived = new Set(
      readLogs(this.workspace.listArchiveFiles()).events.map(({ event }) => event.event_id)
    );
    const eventsByTask = new Map<string, LocatedEvent[]>();
    for (const located of dedupeEvents(allEvents)) {
      const group = eventsByTask.get(located.event.task_id);
      if (group) group.push(located);
      else eventsByTask.set(located.event.task_id, [located]);
    }

    const writes: PlannedWrite[] = [];
    for (const month of [...byMonth.keys()].sort()) {
      const target = this.workspace.archiveFileFor(month);
      const lines: string[] = [];
      for (const task of byMonth.get(month) ?? []) {
        for (const located of sortCanonical(eventsByTask.get(task.task_id) ?? [])) {
          if (archived.has(located.event.event_id)) continue;
          lines.push(located.raw);
        }
      }
      if (lines.length === 0) continue;

      const existing = readIfExists(target);
      writes.push({
        target,
        content: `${withTrailingNewline(existing ?? '')}${lines.join('\n')}\n`,
        expected: existing,
      });
    }
    return writes;
  }

  private planActiveWrites(active: ActiveFile[], selectedIds: Set<string>): PlannedWrite[] {
    const writes: PlannedWrite[] = [];
    for (const entry of active) {
      const removed = new Set(
        entry.events.filter(({ event }) => selectedIds.has(event.task_id)).map(({ source }) => source.line)
      );
      if (removed.size === 0) continue;

      const kept = entry.lines.filter((_, index) => !removed.has(index + 1));
      const hasEvents = kept.some((line) => line.trim() !== '');
      writes.push({
        target: entry.file.path,
        content: hasEvents ? `${kept.join('\n')}\n` : null,
        expected: entry.text,
      });
    }
    return writes;
  }

  /**
   * Writes the temp files, checks that no target changed since it was read,
   * then commits through the journal. A changed target aborts before the
   * journal exists, leaving every log as it was.
   */
  protected commit(writes: PlannedWrite[]): void {
    const operations: JournalOperation[] = [];
    const discardTemps = (): void => {
      for (const op of operations) {
        if (op.action === 'replace') fs.rmSync(this.resolve(op.temp), { force: true });
      }
    };
    try {
      for (const write of writes) {
        if (write.content === null) {
          operations.push({ action: 'remove', target: this.workspace.relative(write.target) });
          continue;
        }
        fs.mkdirSync(path.dirname(write.target), { recursive: true });
        const temp = tempPathFor(write.target);
        writeFileDurable(temp, write.content);
        operations.push({
          action: 'replace',
          target: this.workspace.relative(write.target),
          temp: this.workspace.relative(temp),
        });
      }
    } catch (err) {
      discardTemps();
      throw err;
    }

    const changed = writes
      .filter((write) => readIfExists(write.target) !== write.expected)
      .map((write) => this.workspace.relative(write.target));
    if (changed.length > 0) {
      discardTemps();
      throw new ArchiveConflictError(changed);
    }

    const journal: Journal = { version: 1, operations };
    writeFileAtomic(this.workspace.journalPath, `${JSON.stringify(journal, null, 2)}\n`);
    this.applyJournal(journal);
  }

  /**
   * Idempotent: a replace whose temp file is gone was already applied.
   */
  private applyJournal(journal: Journal): void {
    for (const op of journal.operations) {
      const target = this.resolve(op.target);
      if (op.action === 'replace') {
        const temp = this.resolve(op.temp);
        if (fs.existsSync(temp)) fs.renameSync(temp, target);
      } else {
        fs.rmSync(target, { force: true });
      }
    }
    fs.rmSync(this.workspace.journalPath, { force: true });
  }

  private removeStrayTemps(): void {
    for (const dir of [this.workspace.eventsDir, this.workspace.archiveDir]) {
      if (!fs.existsSync(dir)) continue;
      for (const name of fs.readdirSync(dir)) {
        if (name.includes('.jsonl.tmp-')) fs.rmSync(path.join(dir, name), { force: true });
      }
    }
  }

  private resolve(relativePath: string): string {
    return path.join(this.workspace.root, relativePath);
  }
}
