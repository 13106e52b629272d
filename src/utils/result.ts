import { logger } from './logger';

export interface ExtractionFailure {
  step: string;
  reason: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ExtractionFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(step: string, reason: string): Result<T> {
  return { ok: false, error: { step, reason } };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Runs one extraction step, turning a thrown error into a failed result. */
export async function attempt<T>(step: string, run: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await run());
  } catch (error) {
    return fail(step, describeError(error));
  }
}

export function unwrapOr<T>(result: Result<T>, fallback: T): T {
  if (result.ok) {
    return result.value;
  }
  logger.debug(`Extraction step '${result.error.step}' failed`, { reason: result.error.reason });
  return fallback;
}
