import { promises as fsp } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { Capability, CapabilityContext, SshConfig } from '@envswitch/contracts';
import { describeError } from '@envswitch/contracts';
import { logger } from '../logging/logger';
import { runCommand, type CommandRunner } from '../shell/run-command';

export interface SshState {
  /** previous contents of the active config; null when there was none */
  contents: string | null;
}

/**
 * Swaps the active ssh client config (`<sshDir>/config`) for the named
 * profile file. A relative `config` is resolved against `sshDir`. The
 * profile is checked with `ssh -G` before it replaces anything.
 */
export class SshCapability implements Capability<'ssh', SshState> {
  readonly kind = 'ssh' as const;

  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly name: string = 'ssh',
    private readonly sshDir: string = join(homedir(), '.ssh'),
  ) {}

  private get activePath(): string {
    return join(this.sshDir, 'config');
  }

  async switch(config: SshConfig, ctx: CapabilityContext): Promise<void> {
    const source = resolve(this.sshDir, config.config);
    if (source === this.activePath) {
      logger.debug('ssh profile already active', { source });
      return;
    }

    try {
      await this.run('ssh', { args: ['-G', '-F', source, 'localhost'], signal: ctx.signal });
    } catch (err) {
      throw new Error(`invalid SSH config ${source}: ${describeError(err)}`, { cause: err });
    }

    let contents: string;
    try {
      contents = await fsp.readFile(source, 'utf8');
    } catch (err) {
      throw new Error(`failed to read SSH config ${source}: ${describeError(err)}`, { cause: err });
    }
    await this.writeActive(contents);
    logger.info('ssh config switched', { source });
  }

  async getCurrentState(): Promise<SshState> {
    try {
      return { contents: await fsp.readFile(this.activePath, 'utf8') };
    } catch (err) {
      if (isNotFound(err)) {
        return { contents: null };
      }
      throw new Error(`failed to read SSH config ${this.activePath}: ${describeError(err)}`, { cause: err });
    }
  }

  async rollback(previousState: SshState): Promise<void> {
    if (previousState.contents === null) {
      await fsp.rm(this.activePath, { force: true });
      logger.info('ssh config removed', { path: this.activePath });
      return;
    }
    await this.writeActive(previousState.contents);
    logger.info('ssh config restored', { path: this.activePath });
  }

  private async writeActive(contents: string): Promise<void> {
    try {
      await fsp.mkdir(this.sshDir, { recursive: true, mode: 0o700 });
      await fsp.writeFile(this.activePath, contents, { encoding: 'utf8', mode: 0o600 });
    } catch (err) {
      throw new Error(`failed to write SSH config ${this.activePath}: ${describeError(err)}`, { cause: err });
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
