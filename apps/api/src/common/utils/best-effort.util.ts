// src/common/utils/best-effort.util.ts
import type { LoggerService } from '@nestjs/common';

/**
 * Outcome of a side operation whose failure must not fail the caller.
 * Callers that do not need it discard it with `void`.
 */
export type BestEffortResult = { ok: true } | { ok: false; error: unknown };

/**
 * Run `op`, logging (warn) instead of throwing when it fails.
 * @param label short operation name used in the log line
 */
export async function bestEffort(
  logger: Pick<LoggerService, 'warn'>,
  label: string,
  op: () => Promise<unknown>,
): Promise<BestEffortResult> {
  try {
    await op();
    return { ok: true };
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`${label} failed (ignored): ${reason}`);
    return { ok: false, error };
  }
}
