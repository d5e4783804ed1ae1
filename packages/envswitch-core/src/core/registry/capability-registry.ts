import { logger } from '@envswitch/adapters/logging';
import {
  selectServiceConfig,
  type Capability,
  type CapabilityContext,
  type ServiceConfig,
  type ServiceKind,
} from '@envswitch/contracts';
import { RegistryLockedError } from '../../errors';

/** The state a service had before the switch, bound to its capability. */
export interface CapturedState {
  restore(ctx: CapabilityContext): Promise<void>;
}

/** A switch bound to the service's own configuration variant. */
export interface PreparedSwitch {
  apply(ctx: CapabilityContext): Promise<void>;
}

/**
 * Type-erased view of a registered capability. The config variant and the
 * state type are bound here once, so the orchestrator never sees them.
 */
export interface CapabilityHandle {
  readonly name: string;
  readonly kind: ServiceKind;
  /** undefined when the entry does not populate the variant this capability consumes */
  prepare(config: ServiceConfig): PreparedSwitch | undefined;
  captureState(ctx: CapabilityContext): Promise<CapturedState>;
}

function bind<K extends ServiceKind, S>(name: string, capability: Capability<K, S>): CapabilityHandle {
  return {
    name,
    kind: capability.kind,
    prepare(config) {
      const variant = selectServiceConfig(capability.kind, config);
      if (variant === undefined) {
        return undefined;
      }
      return { apply: (ctx) => capability.switch(variant, ctx) };
    },
    async captureState(ctx) {
      const state = await capability.getCurrentState(ctx);
      return { restore: (restoreCtx) => capability.rollback(state, restoreCtx) };
    },
  };
}

/**
 * Service name → capability. Registration is refused while a switch holds a
 * lease, so the set of capabilities cannot change under a running switch.
 */
export class CapabilityRegistry {
  private readonly handles = new Map<string, CapabilityHandle>();
  private leases = 0;

  register<K extends ServiceKind, S>(capability: Capability<K, S>): this {
    return this.registerAs(capability.name, capability);
  }

  /** Register under a service name other than the capability's own. */
  registerAs<K extends ServiceKind, S>(name: string, capability: Capability<K, S>): this {
    if (this.leases > 0) {
      throw new RegistryLockedError(name);
    }
    if (this.handles.has(name)) {
      logger.warn('replacing registered capability', { service: name });
    }
    this.handles.set(name, bind(name, capability));
    logger.debug('capability registered', { service: name, kind: capability.kind });
    return this;
  }

  get(name: string): CapabilityHandle | undefined {
    return this.handles.get(name);
  }

  has(name: string): boolean {
    return this.handles.has(name);
  }

  /** Registered service names, sorted. */
  list(): string[] {
    return Array.from(this.handles.keys()).sort();
  }

  get locked(): boolean {
    return this.leases > 0;
  }

  /** Freeze registration until the returned release function is called. */
  lease(): () => void {
    this.leases++;
    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.leases--;
      }
    };
  }
}
