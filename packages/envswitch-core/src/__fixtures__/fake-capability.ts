import type { Capability, CapabilityContext, DockerConfig } from '@envswitch/contracts';

export interface FakeCapabilityOptions {
  /** value returned by getCurrentState */
  state?: string;
  switchError?: Error;
  captureError?: Error;
  rollbackError?: Error;
  /** shared across fakes to assert call order between services */
  journal?: string[];
  /** runs inside switch, before switchError is thrown */
  onSwitch?: (ctx: CapabilityContext) => Promise<void>;
}

/** In-memory docker-kind capability recording every call. */
export class FakeCapability implements Capability<'docker', string> {
  readonly kind = 'docker' as const;
  readonly applied: DockerConfig[] = [];
  readonly restored: string[] = [];
  readonly journal: string[];
  captures = 0;

  constructor(
    readonly name: string,
    private readonly opts: FakeCapabilityOptions = {},
  ) {
    this.journal = opts.journal ?? [];
  }

  async switch(config: DockerConfig, ctx: CapabilityContext): Promise<void> {
    this.journal.push(`switch:${this.name}`);
    await this.opts.onSwitch?.(ctx);
    if (this.opts.switchError) {
      throw this.opts.switchError;
    }
    this.applied.push(config);
  }

  async getCurrentState(): Promise<string> {
    this.journal.push(`capture:${this.name}`);
    this.captures++;
    if (this.opts.captureError) {
      throw this.opts.captureError;
    }
    return this.opts.state ?? `${this.name}-before`;
  }

  async rollback(previousState: string): Promise<void> {
    this.journal.push(`rollback:${this.name}`);
    if (this.opts.rollbackError) {
      throw this.opts.rollbackError;
    }
    this.restored.push(previousState);
  }
}
