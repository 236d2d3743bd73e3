/**
 * Decoding of registry error bodies.
 * @module diagnostics
 */

import { z } from 'zod';

/**
 * One entry of a registry `errors` array.
 */
export interface Diagnostic {
  readonly code?: string;
  readonly message?: string;
  readonly detail?: unknown;
}

/**
 * Code used when the body is not a structured error document.
 */
export const UNKNOWN_DIAGNOSTIC_CODE = 'UNKNOWN';

// Fields are read leniently; only the shape of the document is enforced.
const diagnosticSchema = z.object({
  code: z.unknown(),
  message: z.unknown(),
  detail: z.unknown(),
});

const errorDocumentSchema = z.object({
  errors: z.array(diagnosticSchema).default([]),
});

/**
 * Decodes a registry error body into its diagnostics, in source order.
 * Any body that is not an error document yields a single UNKNOWN entry
 * whose message is the raw body.
 */
export function decodeDiagnostics(body: string): Diagnostic[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return [unknownDiagnostic(body)];
  }

  const result = errorDocumentSchema.safeParse(parsed);
  if (!result.success) {
    return [unknownDiagnostic(body)];
  }

  return result.data.errors.map((entry) => {
    const diagnostic: { code?: string; message?: string; detail?: unknown } = {};
    const code = asText(entry.code);
    if (code !== undefined) {
      diagnostic.code = code;
    }
    const message = asText(entry.message);
    if (message !== undefined) {
      diagnostic.message = message;
    }
    if (entry.detail !== undefined && entry.detail !== null) {
      diagnostic.detail = entry.detail;
    }
    return diagnostic;
  });
}

/**
 * null and undefined are absent; anything else is rendered as text.
 */
function asText(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return typeof value === 'string' ? value : String(value);
}

function unknownDiagnostic(body: string): Diagnostic {
  return { code: UNKNOWN_DIAGNOSTIC_CODE, message: body };
}

/**
 * Renders a diagnostic as `message: detail`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const message = diagnostic.message ?? '';
  let detail = '';
  if (typeof diagnostic.detail === 'string') {
    detail = diagnostic.detail;
  } else if (diagnostic.detail !== undefined) {
    detail = JSON.stringify(diagnostic.detail);
  }
  return `${message}: ${detail}`;
}

/**
 * Two diagnostics are equal when code, message and detail match.
 */
export function diagnosticsEqual(a: Diagnostic, b: Diagnostic): boolean {
  return (
    a.code === b.code &&
    a.message === b.message &&
    JSON.stringify(a.detail) === JSON.stringify(b.detail)
  );
}
