import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { StateCache } from './state-cache.js';
import { fingerprintFiles } from './fingerprint.js';
import { loadSnapshot, rebuildSnapshot } from '../projections/rebuild.js';
import { createTestWorkspace, makeEvent, writeLog, type TestWorkspace } from '../store/test-utils.js';

describe('StateCache', () => {
  let ctx: TestWorkspace;
  let cache: StateCache;

  beforeEach(() => {
    ctx = createTestWorkspace();
    cache = new StateCache(ctx.workspace);
    writeLog(ctx.workspace, '2026-01-05.jsonl', [
      makeEvent({ task_id: 'T2', seq: 1, operation: { type: 'create', title: 'Second' } }),
      makeEvent({ task_id: 'T1', seq: 1, operation: { type: 'create', title: 'First', tags: ['b', 'a'] } }),
      makeEvent({ task_id: 'T1', seq: 2, operation: { type: 'assign', assignee: 'alice' } }),
    ]);
  });

  afterEach(() => {
    ctx.cleanup();
  });

  it('round-trips a snapshot through both files', () => {
    const snapshot = rebuildSnapshot(ctx.workspace);
    cache.save(snapshot);

    const loaded = cache.load();
    expect(loaded?.fingerprint).toBe(snapshot.fingerprint);
    expect(loaded?.eventCount).toBe(3);
    expect(loaded?.tasks).toEqual(snapshot.tasks);

    const index = JSON.parse(fs.readFileSync(ctx.workspace.indexPath, 'utf-8'));
    expect(Object.keys(index.tasks)).toEqual(['T1', 'T2']);
    expect(index.tasks.T1).toEqual({
      title: 'First',
      status: 'open',
      priority: 'p2',
      assignee: 'alice',
      stream: null,
      updated_at: '2026-01-05T10:00:00.000Z',
    });
  });

  it('rebuilds byte-identical files from the same logs', () => {
    cache.save(rebuildSnapshot(ctx.workspace));
    const firstState = fs.readFileSync(ctx.workspace.statePath);
    const firstIndex = fs.readFileSync(ctx.workspace.indexPath);

    cache.clear();
    cache.save(rebuildSnapshot(ctx.workspace));

    expect(fs.readFileSync(ctx.workspace.statePath).equals(firstState)).toBe(true);
    expect(fs.readFileSync(ctx.workspace.indexPath).equals(firstIndex)).toBe(true);
  });

  it('treats a corrupt cache file as absent', () => {
    cache.save(rebuildSnapshot(ctx.workspace));
    fs.writeFileSync(ctx.workspace.statePath, '{"format":1,');
    expect(cache.load()).toBeNull();
  });

  it('treats mismatched fingerprints between the two files as absent', () => {
    cache.save(rebuildSnapshot(ctx.workspace));
    const index = JSON.parse(fs.readFileSync(ctx.workspace.indexPath, 'utf-8'));
    index.fingerprint = 'other';
    fs.writeFileSync(ctx.workspace.indexPath, JSON.stringify(index));
    expect(cache.load()).toBeNull();
  });

  describe('loadSnapshot', () => {
    it('serves the cache while the logs are unchanged', () => {
      const first = loadSnapshot(ctx.workspace, cache);
      const stateBefore = fs.statSync(ctx.workspace.statePath).mtimeMs;
      const second = loadSnapshot(ctx.workspace, cache);

      expect(second).toEqual(first);
      expect(fs.statSync(ctx.workspace.statePath).mtimeMs).toBe(stateBefore);
    });

    it('rebuilds after the logs change', () => {
      loadSnapshot(ctx.workspace, cache);
      writeLog(ctx.workspace, '2026-01-06.jsonl', [
        makeEvent({ task_id: 'T3', seq: 1, operation: { type: 'create', title: 'Third' } }),
      ]);

      const snapshot = loadSnapshot(ctx.workspace, cache);
      expect(Object.keys(snapshot.tasks)).toEqual(['T1', 'T2', 'T3']);
      expect(snapshot.fingerprint).toBe(fingerprintFiles(ctx.workspace.listEventFiles()));
    });

    it('ignores mtime-only changes', () => {
      const first = loadSnapshot(ctx.workspace, cache);
      const [file] = ctx.workspace.listEventFiles();
      fs.utimesSync(file.path, new Date('2030-01-01'), new Date('2030-01-01'));
      expect(loadSnapshot(ctx.workspace, cache).fingerprint).toBe(first.fingerprint);
    });
  });
});
