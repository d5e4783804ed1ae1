import { logger } from '@envswitch/adapters/logging';
import { describeError, type CapabilityContext } from '@envswitch/contracts';
import type { CapturedState } from '../registry/capability-registry';

export interface RollbackFailure {
  service: string;
  error: string;
}

/**
 * Restore every captured service once, in capture order. Failures are
 * collected and the sweep carries on; nothing is retried.
 */
export async function rollbackServices(
  captured: ReadonlyMap<string, CapturedState>,
  ctx: CapabilityContext,
): Promise<RollbackFailure[]> {
  const failures: RollbackFailure[] = [];

  for (const [service, state] of captured) {
    try {
      await state.restore(ctx);
      logger.info('service rolled back', { service });
    } catch (err) {
      logger.warn('rollback failed', { service, error: describeError(err) });
      failures.push({ service, error: describeError(err) });
    }
  }

  logger.info('rollback finished', { services: captured.size, failed: failures.length });
  return failures;
}

/** One message for the whole sweep: `svc: message; svc: message`. */
export function combineRollbackFailures(failures: readonly RollbackFailure[]): string {
  return failures.map((f) => `${f.service}: ${f.error}`).join('; ');
}
