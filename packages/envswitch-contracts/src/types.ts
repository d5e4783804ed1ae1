import type { ServiceConfigMap, ServiceKind } from './schema/environment.schema';

/** Passed to every capability call; carries the deadline of the whole switch. */
export interface CapabilityContext {
  readonly signal: AbortSignal;
}

/**
 * Per-service adapter contract.
 *
 * `kind` names the configuration variant the capability consumes; `S` is the
 * opaque state returned by `getCurrentState` and handed back verbatim to
 * `rollback`.
 */
export interface Capability<K extends ServiceKind = ServiceKind, S = unknown> {
  /** Stable identifier matching keys of `Environment.services` and dependency constraints. */
  readonly name: string;
  readonly kind: K;
  /** Rejects when the target state was not reached. */
  switch(config: ServiceConfigMap[K], ctx: CapabilityContext): Promise<void>;
  getCurrentState(ctx: CapabilityContext): Promise<S>;
  rollback(previousState: S, ctx: CapabilityContext): Promise<void>;
}

export interface ServiceGroup {
  level: number;
  services: string[];
}

export interface SwitchErrorRecord {
  service: string;
  error: string;
  /** ISO-8601 */
  time: string;
}

export interface SwitchResult {
  readonly success: boolean;
  readonly switchedServices: readonly string[];
  readonly failedServices: readonly string[];
  readonly rollbackPerformed: boolean;
  readonly durationMs: number;
  readonly errors: readonly SwitchErrorRecord[];
}

export interface SwitchProgress {
  totalServices: number;
  completedServices: number;
  status: string;
  /** epoch ms */
  startTime: number;
  /** epoch ms, linear extrapolation from the levels completed so far */
  estimatedEnd: number;
}

export type ProgressCallback = (progress: SwitchProgress) => void;

export interface SwitchOptions {
  /** Capture state but never call `switch`. */
  dryRun?: boolean;
  /** Run the services of a level concurrently when it has more than one. */
  parallel?: boolean;
  /** Restore every captured service when a level fails. */
  rollbackOnError?: boolean;
  /** Deadline for the whole switch. */
  timeoutMs?: number;
  /** Ambient cancellation, combined with `timeoutMs`. */
  signal?: AbortSignal;
  /** Upper bound on concurrent services inside one parallel level. */
  maxConcurrency?: number;
}
