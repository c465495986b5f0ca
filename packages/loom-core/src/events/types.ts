import { z } from 'zod';

export const SCHEMA_VERSION = 1;

export enum OperationType {
  Create = 'create',
  UpdateField = 'update_field',
  Assign = 'assign',
  Unassign = 'unassign',
  Comment = 'comment',
  Link = 'link',
  Unlink = 'unlink',
  SetStream = 'set_stream',
  Complete = 'complete',
  Reopen = 'reopen',
}

export enum TaskStatus {
  Open = 'open',
  Complete = 'complete',
}

export const PRIORITIES = ['p0', 'p1', 'p2', 'p3'] as const;
export type Priority = (typeof PRIORITIES)[number];
export const DEFAULT_PRIORITY: Priority = 'p2';

export const RESOLUTIONS = ['done', 'wontfix', 'duplicate', 'obsolete'] as const;
export type Resolution = (typeof RESOLUTIONS)[number];

export const LINK_RELATIONS = ['blocks', 'blocked_by', 'parent'] as const;
export type LinkRelation = (typeof LINK_RELATIONS)[number];

export const UPDATABLE_TASK_FIELDS = ['title', 'description', 'priority', 'tags'] as const;
export type UpdatableTaskField = (typeof UPDATABLE_TASK_FIELDS)[number];

// =============================================================================
// Field Size Limits
// =============================================================================
export const FIELD_LIMITS = {
  TITLE: 256,
  DESCRIPTION: 16384,
  TAG: 64,
  COMMENT: 16384,
  REF: 512,
  REASON: 1024,
  STREAM: 128,
  IDENTIFIER: 255,
  ARRAY_MAX_ITEMS: 100,
} as const;

// =============================================================================
// Base Validators
// =============================================================================

const isoDateTime = z.string().refine((s) => !Number.isNaN(Date.parse(s)), {
  message: 'Must be an ISO-8601 datetime string',
});

const nonEmptyString = z.string().min(1).max(FIELD_LIMITS.IDENTIFIER);

const titleString = z
  .string()
  .max(FIELD_LIMITS.TITLE)
  .refine((s) => s.trim().length > 0, { message: 'Title cannot be blank' });
const descriptionString = z.string().max(FIELD_LIMITS.DESCRIPTION);
const tagString = z.string().min(1).max(FIELD_LIMITS.TAG);
const tagsArray = z.array(tagString).max(FIELD_LIMITS.ARRAY_MAX_ITEMS);
const streamString = z.string().min(1).max(FIELD_LIMITS.STREAM);
const priorityValue = z.enum(PRIORITIES);

// =============================================================================
// Operation Schemas
// =============================================================================

const CreateOperationSchema = z.object({
  type: z.literal(OperationType.Create),
  title: titleString,
  description: descriptionString.optional(),
  priority: priorityValue.optional(),
  tags: tagsArray.optional(),
  assignee: nonEmptyString.optional(),
  stream: streamString.optional(),
});

const UpdateFieldOperationSchema = z.discriminatedUnion('field', [
  z.object({ type: z.literal(OperationType.UpdateField), field: z.literal('title'), value: titleString }),
  z.object({
    type: z.literal(OperationType.UpdateField),
    field: z.literal('description'),
    value: descriptionString.nullable(),
  }),
  z.object({ type: z.literal(OperationType.UpdateField), field: z.literal('priority'), value: priorityValue }),
  z.object({ type: z.literal(OperationType.UpdateField), field: z.literal('tags'), value: tagsArray }),
]);

const AssignOperationSchema = z.object({
  type: z.literal(OperationType.Assign),
  assignee: nonEmptyString,
});

const UnassignOperationSchema = z.object({
  type: z.literal(OperationType.Unassign),
});

const CommentOperationSchema = z.object({
  type: z.literal(OperationType.Comment),
  body: z.string().min(1).max(FIELD_LIMITS.COMMENT),
  ref: z.string().min(1).max(FIELD_LIMITS.REF).optional(),
});

const LinkOperationSchema = z.object({
  type: z.literal(OperationType.Link),
  rel: z.enum(LINK_RELATIONS),
  target: nonEmptyString,
});

const UnlinkOperationSchema = z.object({
  type: z.literal(OperationType.Unlink),
  rel: z.enum(LINK_RELATIONS),
  target: nonEmptyString,
});

const SetStreamOperationSchema = z.object({
  type: z.literal(OperationType.SetStream),
  stream: streamString.nullable(),
});

const CompleteOperationSchema = z.object({
  type: z.literal(OperationType.Complete),
  resolution: z.enum(RESOLUTIONS),
});

const ReopenOperationSchema = z.object({
  type: z.literal(OperationType.Reopen),
  reason: z.string().max(FIELD_LIMITS.REASON).optional(),
});

// =============================================================================
// Inferred Types
// =============================================================================

export type CreateOperation = z.infer<typeof CreateOperationSchema>;
export type UpdateFieldOperation = z.infer<typeof UpdateFieldOperationSchema>;
export type AssignOperation = z.infer<typeof AssignOperationSchema>;
export type UnassignOperation = z.infer<typeof UnassignOperationSchema>;
export type CommentOperation = z.infer<typeof CommentOperationSchema>;
export type LinkOperation = z.infer<typeof LinkOperationSchema>;
export type UnlinkOperation = z.infer<typeof UnlinkOperationSchema>;
export type SetStreamOperation = z.infer<typeof SetStreamOperationSchema>;
export type CompleteOperation = z.infer<typeof CompleteOperationSchema>;
export type ReopenOperation = z.infer<typeof ReopenOperationSchema>;

export type Operation =
  | CreateOperation
  | UpdateFieldOperation
  | AssignOperation
  | UnassignOperation
  | CommentOperation
  | LinkOperation
  | UnlinkOperation
  | SetStreamOperation
  | CompleteOperation
  | ReopenOperation;

// =============================================================================
// Schema Registry
// =============================================================================

export const OperationSchemas: Record<OperationType, z.ZodType<Operation, z.ZodTypeDef, unknown>> = {
  [OperationType.Create]: CreateOperationSchema,
  [OperationType.UpdateField]: UpdateFieldOperationSchema,
  [OperationType.Assign]: AssignOperationSchema,
  [OperationType.Unassign]: UnassignOperationSchema,
  [OperationType.Comment]: CommentOperationSchema,
  [OperationType.Link]: LinkOperationSchema,
  [OperationType.Unlink]: UnlinkOperationSchema,
  [OperationType.SetStream]: SetStreamOperationSchema,
  [OperationType.Complete]: CompleteOperationSchema,
  [OperationType.Reopen]: ReopenOperationSchema,
};

const KNOWN_OPERATION_TYPES = new Set<string>(Object.values(OperationType));

export function isKnownOperationType(type: string): type is OperationType {
  return KNOWN_OPERATION_TYPES.has(type);
}

/**
 * Validates an operation payload before it is written. Throws a ZodError
 * for unknown types or invalid fields.
 */
export function validateOperation(operation: unknown): Operation {
  const head = z.object({ type: z.nativeEnum(OperationType) }).passthrough().parse(operation);
  return OperationSchemas[head.type].parse(operation);
}

export type OperationParseResult =
  | { status: 'ok'; operation: Operation }
  | { status: 'unknown'; type: string }
  | { status: 'invalid'; message: string };

/**
 * Parses a stored operation without throwing. Unknown types are reported as
 * such so newer writers never break older readers.
 */
export function parseOperation(payload: OperationPayload): OperationParseResult {
  if (!isKnownOperationType(payload.type)) {
    return { status: 'unknown', type: payload.type };
  }
  const result = OperationSchemas[payload.type].safeParse(payload);
  if (!result.success) {
    return { status: 'invalid', message: formatIssues(result.error) };
  }
  return { status: 'ok', operation: result.data };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// =============================================================================
// Envelope
// =============================================================================

export const EventEnvelopeSchema = z.object({
  v: z.number().int().min(1),
  event_id: nonEmptyString,
  task_id: nonEmptyString,
  seq: z.number().int().min(1),
  timestamp: isoDateTime,
  author: nonEmptyString,
  branch: nonEmptyString,
  operation: z.object({ type: z.string().min(1) }).passthrough(),
});

export type OperationPayload = z.infer<typeof EventEnvelopeSchema>['operation'];

/**
 * One line of an event log. `operation` stays a raw payload so operations
 * written by newer versions survive a read/write round trip untouched.
 */
export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;
