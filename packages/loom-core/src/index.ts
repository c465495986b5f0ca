/**
 * loom core - an event-sourced task ledger stored as plain JSONL files that
 * live in git next to the code they track.
 *
 * @packageDocumentation
 */

// ============================================================================
// Workspace
// ============================================================================

export {
  Workspace,
  WorkspaceExistsError,
  WorkspaceNotFoundError,
  LOOM_DIR_NAME,
  type LogFile,
  type LogKind,
} from './store/workspace.js';

// ============================================================================
// Events
// ============================================================================

export {
  EventStore,
  appendEvent,
  type AppendEventInput,
  type EventStoreOptions,
  type ReadEventsOptions,
} from './events/store.js';

export {
  OperationType,
  TaskStatus,
  SCHEMA_VERSION,
  PRIORITIES,
  DEFAULT_PRIORITY,
  RESOLUTIONS,
  LINK_RELATIONS,
  UPDATABLE_TASK_FIELDS,
  FIELD_LIMITS,
  EventEnvelopeSchema,
  OperationSchemas,
  isKnownOperationType,
  validateOperation,
  parseOperation,
  formatIssues,
  type EventEnvelope,
  type Operation,
  type OperationPayload,
  type Priority,
  type Resolution,
  type LinkRelation,
  type UpdatableTaskField,
  type CreateOperation,
  type UpdateFieldOperation,
  type CompleteOperation,
} from './events/types.js';

export { compareEvents, sortCanonical } from './events/ordering.js';

export {
  readLogs,
  readLogFile,
  parseLogText,
  type LocatedEvent,
  type LogReadResult,
} from './events/reader.js';

export {
  DiagnosticKind,
  DIAGNOSTIC_SEVERITY,
  formatLocation,
  type Diagnostic,
  type DiagnosticSeverity,
} from './events/diagnostics.js';

// ============================================================================
// Projections
// ============================================================================

export { type Task, type TaskComment, type TaskLinks, type IndexEntry } from './projections/task-state.js';
export { replayEvents, replayWorkspace, type ReplayResult } from './projections/replay.js';
export { rebuildSnapshot, loadSnapshot } from './projections/rebuild.js';

// ============================================================================
// Cache
// ============================================================================

export { StateCache, CACHE_FORMAT, type StateSnapshot } from './cache/state-cache.js';
export { computeFingerprint, fingerprintFiles } from './cache/fingerprint.js';

// ============================================================================
// Services
// ============================================================================

export {
  TaskService,
  TaskNotFoundError,
  AmbiguousPrefixError,
  TaskArchivedError,
  InvalidTransitionError,
  InvalidLinkError,
  type CreateTaskInput,
  type EventContext,
  type EventDefaults,
  type FieldUpdate,
  type ApplyInput,
  type ListTasksOptions,
  type GetTaskOptions,
  type StatusFilter,
  type TaskListItem,
} from './services/task-service.js';

export {
  ArchiveService,
  ArchiveBlockedError,
  ArchiveConflictError,
  type ArchiveOptions,
  type ArchiveResult,
} from './services/archive-service.js';

export {
  ValidationService,
  type ValidateOptions,
  type ValidationResult,
} from './services/validation-service.js';

// ============================================================================
// Utilities
// ============================================================================

export { generateId, isValidId } from './utils/id.js';
export { dayKey, monthKey, daysBefore } from './utils/dates.js';
