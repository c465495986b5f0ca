import fs from 'fs';
import { computeFingerprint, fingerprintFiles } from '../cache/fingerprint.js';
import type { StateCache, StateSnapshot } from '../cache/state-cache.js';
import type { Diagnostic } from '../events/diagnostics.js';
import { parseLogText, sourceName, type LocatedEvent } from '../events/reader.js';
import type { Workspace } from '../store/workspace.js';
import { replayEvents } from './replay.js';

/**
 * Replays the active logs from scratch. Each file is read once and the same
 * bytes feed both the fingerprint and the parser, so a snapshot never claims
 * content it did not see.
 */
export function rebuildSnapshot(workspace: Workspace): StateSnapshot {
  const files = workspace.listEventFiles().map((file) => ({ file, content: fs.readFileSync(file.path) }));
  const fingerprint = computeFingerprint(files.map(({ file, content }) => ({ name: file.name, content })));

  const events: LocatedEvent[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const { file, content } of files) {
    const result = parseLogText(content.toString('utf-8'), { file: sourceName(file), kind: file.kind });
    events.push(...result.events);
    diagnostics.push(...result.diagnostics);
  }

  const replayed = replayEvents(events, diagnostics);
  return {
    fingerprint,
    eventCount: replayed.eventCount,
    tasks: Object.fromEntries(replayed.tasks),
    diagnostics: replayed.diagnostics,
  };
}

/**
 * Returns the cached snapshot when its fingerprint matches the logs on disk,
 * otherwise rebuilds and rewrites the cache.
 */
export function loadSnapshot(workspace: Workspace, cache: StateCache): StateSnapshot {
  const cached = cache.load();
  if (cached && cached.fingerprint === fingerprintFiles(workspace.listEventFiles())) {
    return cached;
  }
  const snapshot = rebuildSnapshot(workspace);
  cache.save(snapshot);
  return snapshot;
}
