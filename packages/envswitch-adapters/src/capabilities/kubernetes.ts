import type { Capability, CapabilityContext, KubernetesConfig } from '@envswitch/contracts';
import { describeError } from '@envswitch/contracts';
import { logger } from '../logging/logger';
import { runCommand, type CommandRunner } from '../shell/run-command';

export interface KubernetesState {
  context: string;
  namespace: string;
}

/**
 * Switches the current kubectl context and, when given, its namespace.
 */
export class KubernetesCapability implements Capability<'kubernetes', KubernetesState> {
  readonly kind = 'kubernetes' as const;

  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly name: string = 'kubernetes',
  ) {}

  async switch(config: KubernetesConfig, ctx: CapabilityContext): Promise<void> {
    await this.apply(config.context, config.namespace ?? '', ctx);
  }

  async getCurrentState(ctx: CapabilityContext): Promise<KubernetesState> {
    const context = await this.read(['config', 'current-context'], ctx);
    const namespace = await this.read(
      ['config', 'view', '--minify', '--output', 'jsonpath={..namespace}'],
      ctx,
    );
    return { context, namespace };
  }

  async rollback(previousState: KubernetesState, ctx: CapabilityContext): Promise<void> {
    await this.apply(previousState.context, previousState.namespace, ctx);
  }

  private async apply(context: string, namespace: string, ctx: CapabilityContext): Promise<void> {
    if (context) {
      try {
        await this.run('kubectl', { args: ['config', 'use-context', context], signal: ctx.signal });
      } catch (err) {
        throw new Error(`failed to set Kubernetes context: ${describeError(err)}`, { cause: err });
      }
    }

    if (namespace) {
      try {
        await this.run('kubectl', {
          args: ['config', 'set-context', '--current', '--namespace', namespace],
          signal: ctx.signal,
        });
      } catch (err) {
        throw new Error(`failed to set Kubernetes namespace: ${describeError(err)}`, { cause: err });
      }
    }

    logger.info('kubernetes context switched', { context, namespace });
  }

  // kubectl exits non-zero when no context is configured; that reads as empty
  private async read(args: string[], ctx: CapabilityContext): Promise<string> {
    const { code, stdout } = await this.run('kubectl', { args, allowFail: true, signal: ctx.signal });
    return code === 0 ? stdout.trim() : '';
  }
}
