/**
 * Tagged stage results for the run pipeline
 */

import { BorgrunError, errorMessage } from "../../errors";
import type { StageResult } from "../../types";

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: BorgrunError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Run a stage and capture its failure. Errors that are not already part of
 * the taxonomy are classified by `wrap`.
 */
export async function attempt<T>(
  stage: () => Promise<T>,
  wrap: (message: string) => BorgrunError,
): Promise<StageResult<T>> {
  try {
    return ok(await stage());
  } catch (error) {
    if (error instanceof BorgrunError) {
      return fail(error);
    }
    return fail(wrap(errorMessage(error)));
  }
}
