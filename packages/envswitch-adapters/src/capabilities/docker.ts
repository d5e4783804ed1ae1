import type { Capability, CapabilityContext, DockerConfig } from '@envswitch/contracts';
import { describeError } from '@envswitch/contracts';
import { logger } from '../logging/logger';
import { runCommand, type CommandRunner } from '../shell/run-command';

export interface DockerState {
  /** empty when the docker CLI reported no context */
  context: string;
}

/**
 * Switches the active docker CLI context (`docker context use`).
 */
export class DockerCapability implements Capability<'docker', DockerState> {
  readonly kind = 'docker' as const;

  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly name: string = 'docker',
  ) {}

  async switch(config: DockerConfig, ctx: CapabilityContext): Promise<void> {
    await this.useContext(config.context, ctx);
  }

  async getCurrentState(ctx: CapabilityContext): Promise<DockerState> {
    const { code, stdout } = await this.run('docker', {
      args: ['context', 'show'],
      allowFail: true,
      signal: ctx.signal,
    });
    if (code !== 0) {
      logger.debug('docker context show failed, treating context as unset', { code });
      return { context: '' };
    }
    return { context: stdout.trim() };
  }

  async rollback(previousState: DockerState, ctx: CapabilityContext): Promise<void> {
    if (!previousState.context) {
      return;
    }
    await this.useContext(previousState.context, ctx);
  }

  private async useContext(context: string, ctx: CapabilityContext): Promise<void> {
    try {
      await this.run('docker', { args: ['context', 'use', context], signal: ctx.signal });
    } catch (err) {
      throw new Error(`failed to set Docker context: ${describeError(err)}`, { cause: err });
    }
    logger.info('docker context switched', { context });
  }
}
