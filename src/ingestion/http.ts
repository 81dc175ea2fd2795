/**
 * JSON over HTTP with schema validation at the boundary.
 * Non-2xx, timeouts and malformed bodies come back as error values.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ok, err, type Result } from '../engine/result.js';
import {
  collaboratorUnavailable,
  validationError,
  type CollaboratorError,
} from '../engine/errors.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface FetchJsonOptions {
  source: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export async function fetchJson<T>(
  url: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: FetchJsonOptions
): Promise<Result<T, CollaboratorError>> {
  let body: unknown;
  try {
    const response = await fetch(url, {
      headers: { Accept: 'application/json', ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    if (!response.ok) {
      return err(collaboratorUnavailable(options.source, `HTTP ${response.status} from ${url}`));
    }

    body = await response.json();
  } catch (error) {
    const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return err(collaboratorUnavailable(options.source, detail));
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return err(validationError(
      options.source,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    ));
  }
  return ok(parsed.data);
}

/**
 * Parse each entry of a batch on its own; invalid entries are dropped and reported
 */
export function parseEach<T>(
  entries: unknown[],
  schema: ZodType<T, ZodTypeDef, unknown>
): { valid: T[]; rejected: number } {
  const valid: T[] = [];
  let rejected = 0;
  for (const entry of entries) {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      rejected++;
    }
  }
  return { valid, rejected };
}
