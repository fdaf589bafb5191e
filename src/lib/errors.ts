// =============================================================================
// ERRORS
// =============================================================================
// ValidationError  - scene description rejected at construction time
// RenderError      - one element could not be drawn; the pass continues
// PathParseError   - malformed path data (a RenderError)
// =============================================================================

import type { ZodError } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(subject: string, issues: ValidationIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid ${subject}: ${summary}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(subject: string, error: ZodError): ValidationError {
    return new ValidationError(
      subject,
      error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
}

export type RenderErrorKind =
  | 'unsupported_shape'
  | 'path_parse'
  | 'missing_image'
  | 'gradient'
  | 'pattern'
  | 'clip_mask'
  | 'decorative'
  | 'text'
  | 'surface';

export class RenderError extends Error {
  readonly kind: RenderErrorKind;
  readonly elementId?: string;

  constructor(kind: RenderErrorKind, message: string, elementId?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
    this.kind = kind;
    this.elementId = elementId;
  }
}

export class PathParseError extends RenderError {
  constructor(message: string) {
    super('path_parse', message);
    this.name = 'PathParseError';
  }
}

/**
 * Result of drawing one element
 */
export type RenderOutcome = { ok: true } | { ok: false; error: RenderError };

export const RENDERED: RenderOutcome = { ok: true };

export function failed(error: RenderError): RenderOutcome {
  return { ok: false, error };
}

/**
 * Wrap anything thrown during a draw into a RenderError of the given kind
 */
export function toRenderError(error: unknown, kind: RenderErrorKind, elementId?: string): RenderError {
  if (error instanceof RenderError) {
    if (error.elementId !== undefined || elementId === undefined) return error;
    return new RenderError(error.kind, error.message, elementId, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RenderError(kind, message, elementId, { cause: error });
}
