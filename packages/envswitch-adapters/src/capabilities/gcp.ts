import type { Capability, CapabilityContext, GcpConfig } from '@envswitch/contracts';
import { describeError } from '@envswitch/contracts';
import { logger } from '../logging/logger';
import { runCommand, type CommandRunner } from '../shell/run-command';

export interface GcpState {
  project: string;
  account: string;
  region: string;
}

const PROPERTIES = {
  project: 'project',
  account: 'account',
  region: 'compute/region',
} as const satisfies Record<keyof GcpState, string>;

type Field = keyof typeof PROPERTIES;

const FIELDS: readonly Field[] = ['project', 'account', 'region'];

/**
 * Sets the active gcloud project, and the account and compute region when
 * given. Properties left out of the config are not touched.
 */
export class GcpCapability implements Capability<'gcp', GcpState> {
  readonly kind = 'gcp' as const;

  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly name: string = 'gcp',
  ) {}

  async switch(config: GcpConfig, ctx: CapabilityContext): Promise<void> {
    for (const field of FIELDS) {
      const value = config[field];
      if (value !== undefined) {
        await this.set(field, value, ctx);
      }
    }
    logger.info('gcloud configuration switched', { project: config.project });
  }

  async getCurrentState(ctx: CapabilityContext): Promise<GcpState> {
    return {
      project: await this.get('project', ctx),
      account: await this.get('account', ctx),
      region: await this.get('region', ctx),
    };
  }

  // a property that was unset before the switch is unset again
  async rollback(previousState: GcpState, ctx: CapabilityContext): Promise<void> {
    for (const field of FIELDS) {
      const value = previousState[field];
      if (value) {
        await this.set(field, value, ctx);
      } else {
        await this.unset(field, ctx);
      }
    }
    logger.info('gcloud configuration restored', { project: previousState.project });
  }

  private async set(field: Field, value: string, ctx: CapabilityContext): Promise<void> {
    try {
      await this.run('gcloud', { args: ['config', 'set', PROPERTIES[field], value], signal: ctx.signal });
    } catch (err) {
      throw new Error(`failed to set GCP ${field}: ${describeError(err)}`, { cause: err });
    }
  }

  private async unset(field: Field, ctx: CapabilityContext): Promise<void> {
    try {
      await this.run('gcloud', { args: ['config', 'unset', PROPERTIES[field]], signal: ctx.signal });
    } catch (err) {
      throw new Error(`failed to unset GCP ${field}: ${describeError(err)}`, { cause: err });
    }
  }

  // gcloud prints nothing on stdout for an unset property
  private async get(field: Field, ctx: CapabilityContext): Promise<string> {
    const { code, stdout } = await this.run('gcloud', {
      args: ['config', 'get-value', PROPERTIES[field]],
      allowFail: true,
      signal: ctx.signal,
    });
    return code === 0 ? stdout.trim() : '';
  }
}
