import type { Services } from './services.js';
import { CLIError, ExitCode } from './errors.js';

/**
 * Resolves a full task id or a unique prefix of one. Archived tasks count, so
 * `show` and `history` can reach them.
 */
export function resolveId(services: Services, idOrPrefix: string): string {
  const resolved = services.taskService.resolveTaskId(idOrPrefix);
  if (resolved === null) {
    throw new CLIError(`Task not found: ${idOrPrefix}`, ExitCode.NotFound, undefined, undefined, ['loom list']);
  }
  return resolved;
}
