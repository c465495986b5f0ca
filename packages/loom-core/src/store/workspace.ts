import fs from 'fs';
import path from 'path';
import { dayKey } from '../utils/dates.js';

export const LOOM_DIR_NAME = '.loom';
const LOG_EXTENSION = '.jsonl';

const GITIGNORE = `# Derived files, rebuilt from events on checkout or merge.
.index.json
.state.json
.archive-journal.json
*.tmp-*
`;

export class WorkspaceNotFoundError extends Error {
  constructor(startDir: string) {
    super(`No ${LOOM_DIR_NAME} directory found from ${startDir}. Run 'loom init' to create one.`);
    this.name = 'WorkspaceNotFoundError';
  }
}

export class WorkspaceExistsError extends Error {
  constructor(root: string) {
    super(`Workspace already exists: ${root}`);
    this.name = 'WorkspaceExistsError';
  }
}

export type LogKind = 'active' | 'archive';

export interface LogFile {
  kind: LogKind;
  /** File name relative to its directory, e.g. `2026-10-19.jsonl`. */
  name: string;
  path: string;
}

/**
 * Layout of a loom root:
 *
 *   events/<YYYY-MM-DD>.jsonl   active logs
 *   archive/<YYYY-MM>.jsonl     archived histories of completed tasks
 *   .index.json, .state.json    disposable caches
 */
export class Workspace {
  readonly root: string;
  readonly eventsDir: string;
  readonly archiveDir: string;

  constructor(root: string) {
    this.root = path.resolve(root);
    this.eventsDir = path.join(this.root, 'events');
    this.archiveDir = path.join(this.root, 'archive');
  }

  get indexPath(): string {
    return path.join(this.root, '.index.json');
  }

  get statePath(): string {
    return path.join(this.root, '.state.json');
  }

  get journalPath(): string {
    return path.join(this.root, '.archive-journal.json');
  }

  /**
   * Walks up from `startDir` looking for a `.loom` directory.
   */
  static discover(startDir: string = process.cwd()): Workspace {
    let dir = path.resolve(startDir);
    while (true) {
      const candidate = path.join(dir, LOOM_DIR_NAME);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
        return new Workspace(candidate);
      }
      const parent = path.dirname(dir);
      if (parent === dir) {
        throw new WorkspaceNotFoundError(startDir);
      }
      dir = parent;
    }
  }

  /**
   * Opens a root created by `init`.
   */
  static open(root: string): Workspace {
    const workspace = new Workspace(root);
    if (!fs.existsSync(workspace.eventsDir)) {
      throw new WorkspaceNotFoundError(workspace.root);
    }
    return workspace;
  }

  static init(root: string): Workspace {
    const workspace = new Workspace(root);
    if (fs.existsSync(workspace.eventsDir)) {
      throw new WorkspaceExistsError(workspace.root);
    }
    fs.mkdirSync(workspace.eventsDir, { recursive: true });
    fs.mkdirSync(workspace.archiveDir, { recursive: true });
    fs.writeFileSync(path.join(workspace.root, '.gitignore'), GITIGNORE);
    return workspace;
  }

  exists(): boolean {
    return fs.existsSync(this.root) && fs.statSync(this.root).isDirectory();
  }

  eventFileFor(timestamp: string): string {
    return path.join(this.eventsDir, `${dayKey(timestamp)}${LOG_EXTENSION}`);
  }

  archiveFileFor(month: string): string {
    return path.join(this.archiveDir, `${month}${LOG_EXTENSION}`);
  }

  listEventFiles(): LogFile[] {
    return listLogs(this.eventsDir, 'active');
  }

  listArchiveFiles(): LogFile[] {
    return listLogs(this.archiveDir, 'archive');
  }

  listLogFiles(options: { includeArchive?: boolean } = {}): LogFile[] {
    const active = this.listEventFiles();
    return options.includeArchive ? [...this.listArchiveFiles(), ...active] : active;
  }

  relative(filePath: string): string {
    return path.relative(this.root, filePath);
  }
}

function listLogs(dir: string, kind: LogKind): LogFile[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(LOG_EXTENSION))
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ kind, name, path: path.join(dir, name) }));
}
