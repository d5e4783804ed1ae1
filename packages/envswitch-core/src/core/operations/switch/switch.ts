import PQueue from 'p-queue';
import { logger } from '@envswitch/adapters/logging';
import type { CommandRunner } from '@envswitch/adapters/shell';
import {
  describeError,
  type CapabilityContext,
  type Environment,
  type ProgressCallback,
  type ServiceGroup,
  type SwitchErrorRecord,
  type SwitchOptions,
  type SwitchProgress,
  type SwitchResult,
} from '@envswitch/contracts';
import { loadSwitcherConfig, type SwitcherConfig } from '../../../config/config';
import { loadNamedEnvironment, validateEnvironment } from '../../../environment/environment';
import {
  DependencyResolutionError,
  EnvironmentSwitchError,
  type SwitchErrorCode,
} from '../../../errors';
import type { CapabilityRegistry, CapturedState } from '../../registry/capability-registry';
import { combineRollbackFailures, rollbackServices } from '../../rollback/rollback';
import { resolveDependencies } from '../dependency-resolver';
import { executeHooks, HookError, type HookPhase } from '../hooks/hooks';
import { createDeadline } from './deadline';

export interface EnvironmentSwitcherOptions {
  /** defaults to `loadSwitcherConfig()` */
  config?: SwitcherConfig;
  /** runs hook commands; defaults to the shell runner */
  runCommand?: CommandRunner;
}

interface ServiceFailure {
  service: string;
  code: SwitchErrorCode;
  message: string;
  cause?: unknown;
}

interface LevelOutcome {
  succeeded: string[];
  failures: ServiceFailure[];
}

/** Mutable bookkeeping of one call, frozen into a SwitchResult at the end. */
class SwitchRecord {
  readonly switched: string[] = [];
  readonly failed: string[] = [];
  readonly errors: SwitchErrorRecord[] = [];
  rollbackPerformed = false;

  constructor(readonly startedAt: number) {}

  error(service: string, error: string): void {
    this.errors.push({ service, error, time: new Date().toISOString() });
  }

  toResult(success: boolean): SwitchResult {
    return Object.freeze({
      success,
      switchedServices: Object.freeze([...this.switched]),
      failedServices: Object.freeze([...this.failed]),
      rollbackPerformed: this.rollbackPerformed,
      durationMs: Date.now() - this.startedAt,
      errors: Object.freeze(this.errors.map((e) => Object.freeze({ ...e }))),
    });
  }
}

function optionsProblem(options: SwitchOptions): string | undefined {
  const { timeoutMs, maxConcurrency } = options;
  if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
    return `timeoutMs must be a positive number, got ${timeoutMs}`;
  }
  if (maxConcurrency !== undefined && !(Number.isInteger(maxConcurrency) && maxConcurrency >= 1)) {
    return `maxConcurrency must be an integer of at least 1, got ${maxConcurrency}`;
  }
  return undefined;
}

/**
 * Switches every service of an environment, level by level in dependency
 * order, with optional rollback of everything captured when a level fails.
 */
export class EnvironmentSwitcher {
  private readonly config: SwitcherConfig;
  private readonly runCommand: CommandRunner | undefined;
  private progressCallback: ProgressCallback | undefined;

  constructor(
    private readonly registry: CapabilityRegistry,
    options: EnvironmentSwitcherOptions = {},
  ) {
    this.config = options.config ?? loadSwitcherConfig();
    this.runCommand = options.runCommand;
  }

  setProgressCallback(callback: ProgressCallback | undefined): void {
    this.progressCallback = callback;
  }

  getAvailableServices(): string[] {
    return this.registry.list();
  }

  /** Find `<name>.yaml` / `<name>.yml` on the configured search paths and switch to it. */
  async switchTo(name: string, options: SwitchOptions = {}): Promise<SwitchResult> {
    const env = await loadNamedEnvironment(name, this.config.searchPaths);
    return this.switchEnvironment(env, options);
  }

  /**
   * Resolves with the result when every level switched. Rejects with
   * EnvironmentSwitchError, carrying the failed result, on any fatal failure.
   */
  async switchEnvironment(env: Environment, options: SwitchOptions = {}): Promise<SwitchResult> {
    const record = new SwitchRecord(Date.now());
    const fail = (code: SwitchErrorCode, service: string, message: string, cause?: unknown): never => {
      record.error(service, message);
      throw new EnvironmentSwitchError(code, message, record.toResult(false), cause);
    };

    const invalid = validateEnvironment(env);
    if (invalid !== undefined) {
      return fail('ERR_INVALID_ENVIRONMENT', 'environment', `invalid environment: ${invalid}`);
    }
    const badOption = optionsProblem(options);
    if (badOption !== undefined) {
      return fail('ERR_INVALID_OPTIONS', 'options', `invalid switch options: ${badOption}`);
    }

    let groups: ServiceGroup[];
    try {
      groups = resolveDependencies(Object.keys(env.services), env.dependencies);
    } catch (err) {
      if (!(err instanceof DependencyResolutionError)) {
        throw err;
      }
      return fail('ERR_DEPENDENCY_RESOLUTION', 'dependencies', `dependency resolution failed: ${err.message}`, err);
    }

    logger.info('switching environment', {
      environment: env.name,
      services: Object.keys(env.services).length,
      levels: groups.length,
      dryRun: options.dryRun ?? false,
      parallel: options.parallel ?? false,
    });

    const release = this.registry.lease();
    const deadline = createDeadline(options.timeoutMs, options.signal);
    try {
      const ctx: CapabilityContext = { signal: deadline.signal };

      try {
        await this.runHooks(env, 'pre', ctx, record);
      } catch (err) {
        if (!(err instanceof HookError)) {
          throw err;
        }
        return fail(err.code, err.hookName, err.message, err);
      }

      const captured = new Map<string, CapturedState>();
      const total = Object.keys(env.services).length;
      let completed = 0;

      for (const group of groups) {
        logger.debug('switching level', { level: group.level, services: group.services });
        const { succeeded, failures } = await this.runLevel(env, group, captured, ctx, options);

        record.switched.push(...succeeded);
        for (const failure of failures) {
          record.failed.push(failure.service);
          record.error(failure.service, failure.message);
        }

        const first = failures[0];
        if (first !== undefined) {
          if (options.rollbackOnError) {
            await this.rollback(captured, options, record);
          }
          const message = failures.length === 1
            ? first.message
            : `parallel switch failed: ${failures.map((f) => f.message).join('; ')}`;
          const code = failures.every((f) => f.code === first.code) ? first.code : 'ERR_SWITCH_FAILED';
          logger.error('environment switch failed', { environment: env.name, level: group.level, error: message });
          throw new EnvironmentSwitchError(code, message, record.toResult(false), first.cause);
        }

        completed += group.services.length;
        this.reportProgress(record.startedAt, total, completed, `level ${group.level + 1}/${groups.length} complete`);
      }

      await this.runPostHooks(env, ctx, record);

      const result = record.toResult(true);
      logger.info('environment switched', {
        environment: env.name,
        switched: result.switchedServices.length,
        durationMs: result.durationMs,
      });
      return result;
    } finally {
      deadline.dispose();
      release();
    }
  }

  private async runLevel(
    env: Environment,
    group: ServiceGroup,
    captured: Map<string, CapturedState>,
    ctx: CapabilityContext,
    options: SwitchOptions,
  ): Promise<LevelOutcome> {
    const outcome: LevelOutcome = { succeeded: [], failures: [] };
    const processService = (service: string) =>
      this.processService(service, env, captured, ctx, options.dryRun ?? false);

    if (options.parallel && group.services.length > 1) {
      const queue = new PQueue({ concurrency: options.maxConcurrency ?? Infinity });
      // every sibling runs to completion; failures are evaluated afterwards
      const results = await Promise.all(
        group.services.map((service) => queue.add(() => processService(service), { throwOnTimeout: true })),
      );
      group.services.forEach((service, i) => {
        const failure = results[i];
        if (failure) {
          outcome.failures.push(failure);
        } else {
          outcome.succeeded.push(service);
        }
      });
      return outcome;
    }

    for (const service of group.services) {
      const failure = await processService(service);
      if (failure) {
        outcome.failures.push(failure);
        break;
      }
      outcome.succeeded.push(service);
    }
    return outcome;
  }

  /** Never throws; every problem comes back as a ServiceFailure. */
  private async processService(
    service: string,
    env: Environment,
    captured: Map<string, CapturedState>,
    ctx: CapabilityContext,
    dryRun: boolean,
  ): Promise<ServiceFailure | undefined> {
    if (ctx.signal.aborted) {
      return {
        service,
        code: 'ERR_SWITCH_CANCELLED',
        message: `switch cancelled before ${service}: ${describeError(ctx.signal.reason)}`,
        cause: ctx.signal.reason,
      };
    }

    const handle = this.registry.get(service);
    if (!handle) {
      return { service, code: 'ERR_NO_SWITCHER', message: `no switcher registered for service: ${service}` };
    }

    const prepared = handle.prepare(env.services[service] ?? {});
    if (!prepared) {
      return {
        service,
        code: 'ERR_NO_CONFIGURATION',
        message: `no configuration provided for service: ${service} (expected a ${handle.kind} entry)`,
      };
    }

    try {
      captured.set(service, await handle.captureState(ctx));
    } catch (err) {
      return {
        service,
        code: 'ERR_STATE_CAPTURE',
        message: `failed to get current state for ${service}: ${describeError(err)}`,
        cause: err,
      };
    }

    if (dryRun) {
      logger.info('dry run, not switching', { service });
      return undefined;
    }

    try {
      await prepared.apply(ctx);
    } catch (err) {
      return {
        service,
        code: ctx.signal.aborted ? 'ERR_SWITCH_CANCELLED' : 'ERR_SWITCH_FAILED',
        message: `failed to switch ${service}: ${describeError(err)}`,
        cause: err,
      };
    }

    logger.debug('service switched', { service });
    return undefined;
  }

  // the switch deadline does not apply to rollback, only the caller's signal
  private async rollback(
    captured: ReadonlyMap<string, CapturedState>,
    options: SwitchOptions,
    record: SwitchRecord,
  ): Promise<void> {
    logger.warn('rolling back captured services', { services: Array.from(captured.keys()) });
    const signal = options.signal ?? new AbortController().signal;
    const failures = await rollbackServices(captured, { signal });
    record.rollbackPerformed = true;
    if (failures.length > 0) {
      record.error('rollback', combineRollbackFailures(failures));
    }
  }

  private async runHooks(
    env: Environment,
    phase: HookPhase,
    ctx: CapabilityContext,
    record: SwitchRecord,
  ): Promise<void> {
    const hooks = phase === 'pre' ? env.preHooks : env.postHooks;
    const skipped = await executeHooks(hooks, phase, {
      signal: ctx.signal,
      defaultTimeoutMs: this.config.hookTimeoutMs,
      run: this.runCommand,
    });
    for (const err of skipped) {
      record.error(err.hookName, err.message);
    }
  }

  private async runPostHooks(env: Environment, ctx: CapabilityContext, record: SwitchRecord): Promise<void> {
    try {
      await this.runHooks(env, 'post', ctx, record);
    } catch (err) {
      if (!(err instanceof HookError)) {
        throw err;
      }
      logger.warn('post-hook failed', { hook: err.hookName, error: err.message });
      record.error(err.hookName, err.message);
    }
  }

  private reportProgress(startTime: number, total: number, completed: number, status: string): void {
    const callback = this.progressCallback;
    if (!callback) {
      return;
    }
    const elapsed = Date.now() - startTime;
    const progress: SwitchProgress = {
      totalServices: total,
      completedServices: completed,
      status,
      startTime,
      estimatedEnd: completed > 0 ? startTime + Math.round((elapsed * total) / completed) : startTime,
    };
    try {
      callback(progress);
    } catch (err) {
      logger.warn('progress callback failed', { error: describeError(err) });
    }
  }
}
