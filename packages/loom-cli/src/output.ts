export const OUTPUT_SCHEMA_VERSION = 'v1';

export interface ErrorEnvelope {
  schema_version: typeof OUTPUT_SCHEMA_VERSION;
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    suggestions?: string[];
  };
}

export function createErrorEnvelope(
  code: string,
  message: string,
  details?: unknown,
  suggestions?: string[]
): ErrorEnvelope {
  return {
    schema_version: OUTPUT_SCHEMA_VERSION,
    ok: false,
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
      ...(suggestions && suggestions.length > 0 ? { suggestions } : {}),
    },
  };
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(formatCell).join(',');
  return JSON.stringify(value);
}

/**
 * Tab-separated rows under a header line.
 */
export function printTable(rows: Record<string, unknown>[], columns: string[]): void {
  console.log(columns.join('\t'));
  for (const row of rows) {
    console.log(columns.map((column) => formatCell(row[column])).join('\t'));
  }
}
