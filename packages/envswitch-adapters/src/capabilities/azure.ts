import type { AzureConfig, Capability, CapabilityContext } from '@envswitch/contracts';
import { describeError } from '@envswitch/contracts';
import { logger } from '../logging/logger';
import { runCommand, type CommandRunner } from '../shell/run-command';

export interface AzureState {
  /** empty when the az CLI has no signed-in account */
  subscription: string;
  tenant: string;
}

/**
 * Selects the active Azure subscription (`az account set`). When `tenant`
 * is given, the subscription must belong to it.
 */
export class AzureCapability implements Capability<'azure', AzureState> {
  readonly kind = 'azure' as const;

  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly name: string = 'azure',
  ) {}

  async switch(config: AzureConfig, ctx: CapabilityContext): Promise<void> {
    await this.setSubscription(config.subscription, ctx);
    if (config.tenant !== undefined) {
      const tenant = await this.show('tenantId', ctx);
      if (tenant !== config.tenant) {
        throw new Error(
          `Azure subscription ${config.subscription} belongs to tenant ${tenant || '(unknown)'}, expected ${config.tenant}`,
        );
      }
    }
    logger.info('azure subscription switched', { subscription: config.subscription });
  }

  async getCurrentState(ctx: CapabilityContext): Promise<AzureState> {
    return {
      subscription: await this.show('id', ctx),
      tenant: await this.show('tenantId', ctx),
    };
  }

  async rollback(previousState: AzureState, ctx: CapabilityContext): Promise<void> {
    if (!previousState.subscription) {
      return;
    }
    await this.setSubscription(previousState.subscription, ctx);
    logger.info('azure subscription restored', { subscription: previousState.subscription });
  }

  private async setSubscription(subscription: string, ctx: CapabilityContext): Promise<void> {
    try {
      await this.run('az', { args: ['account', 'set', '--subscription', subscription], signal: ctx.signal });
    } catch (err) {
      throw new Error(`failed to set Azure subscription: ${describeError(err)}`, { cause: err });
    }
  }

  private async show(query: string, ctx: CapabilityContext): Promise<string> {
    const { code, stdout } = await this.run('az', {
      args: ['account', 'show', '--query', query, '-o', 'tsv'],
      allowFail: true,
      signal: ctx.signal,
    });
    return code === 0 ? stdout.trim() : '';
  }
}
