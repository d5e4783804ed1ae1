import type { AwsConfig, Capability, CapabilityContext } from '@envswitch/contracts';
import { describeError } from '@envswitch/contracts';
import { logger } from '../logging/logger';
import { runCommand, type CommandRunner } from '../shell/run-command';

export interface AwsState {
  /** `AWS_PROFILE` of this process; empty when unset */
  profile: string;
  /** region configured for that profile; empty when none */
  region: string;
}

/**
 * Selects an AWS CLI profile for this process and its children (`AWS_PROFILE`)
 * and writes the profile's region with `aws configure set`. When `accountId`
 * is given, the profile must resolve to that account.
 */
export class AwsCapability implements Capability<'aws', AwsState> {
  readonly kind = 'aws' as const;

  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly name: string = 'aws',
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async switch(config: AwsConfig, ctx: CapabilityContext): Promise<void> {
    await this.setRegion(config.region, config.profile, ctx);
    if (config.accountId !== undefined) {
      await this.verifyAccount(config.profile, config.accountId, ctx);
    }
    this.env.AWS_PROFILE = config.profile;
    logger.info('aws profile switched', { profile: config.profile, region: config.region });
  }

  async getCurrentState(ctx: CapabilityContext): Promise<AwsState> {
    const profile = this.env.AWS_PROFILE ?? '';
    const { code, stdout } = await this.run('aws', {
      args: ['configure', 'get', 'region', ...profileArgs(profile)],
      allowFail: true,
      signal: ctx.signal,
    });
    return { profile, region: code === 0 ? stdout.trim() : '' };
  }

  async rollback(previousState: AwsState, ctx: CapabilityContext): Promise<void> {
    if (previousState.region) {
      await this.setRegion(previousState.region, previousState.profile, ctx);
    }
    if (previousState.profile) {
      this.env.AWS_PROFILE = previousState.profile;
    } else {
      delete this.env.AWS_PROFILE;
    }
    logger.info('aws profile restored', { profile: previousState.profile || '(unset)' });
  }

  private async setRegion(region: string, profile: string, ctx: CapabilityContext): Promise<void> {
    try {
      await this.run('aws', {
        args: ['configure', 'set', 'region', region, ...profileArgs(profile)],
        signal: ctx.signal,
      });
    } catch (err) {
      throw new Error(`failed to set AWS region: ${describeError(err)}`, { cause: err });
    }
  }

  private async verifyAccount(profile: string, accountId: string, ctx: CapabilityContext): Promise<void> {
    let account: string;
    try {
      const { stdout } = await this.run('aws', {
        args: ['sts', 'get-caller-identity', '--query', 'Account', '--output', 'text', ...profileArgs(profile)],
        signal: ctx.signal,
      });
      account = stdout.trim();
    } catch (err) {
      throw new Error(`failed to verify AWS account: ${describeError(err)}`, { cause: err });
    }
    if (account !== accountId) {
      throw new Error(`AWS profile ${profile} resolves to account ${account}, expected ${accountId}`);
    }
  }
}

function profileArgs(profile: string): string[] {
  return profile ? ['--profile', profile] : [];
}
