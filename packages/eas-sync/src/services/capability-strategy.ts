/**
 * @exsync/eas-sync - Capability Strategy
 *
 * The single place that decides between the native ActiveSync path and
 * the EWS path. The version is detected once per connection and every
 * service asks here instead of branching on version numbers itself.
 */

import { getLogger } from '@exsync/logger';

import { fail, ok } from '../interfaces/result';
import { NATIVE_CAPABILITY_MAJOR, majorVersionOf } from '../transport/version-detector';

import type { ILogger } from '@exsync/logger';
import type { VersionSource } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';

export type ProtocolPath = 'native' | 'soap';

/** Lowest major version on which each native command family exists */
export const NativeMinimum = {
  /** Notes class, task Body/Utc dates in Change */
  ENTITIES: NATIVE_CAPABILITY_MAJOR,
  /** Sync, MoveItems, Search and FolderSync */
  CORE: 12,
} as const;

export interface CapabilityStrategy {
  version: string;
  major: number;
}

/**
 * One implementation per path. A `null` soap entry means the operation
 * has no EWS equivalent.
 */
export interface PathImplementations<T> {
  native: T;
  soap: T | null;
}

export class CapabilityResolver {
  private strategy: CapabilityStrategy | null = null;
  private readonly logger: ILogger;

  constructor(
    private readonly versions: VersionSource,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'CapabilityResolver' });
  }

  async resolve(): Promise<EasResult<CapabilityStrategy>> {
    if (this.strategy) {
      return ok(this.strategy);
    }
    const detected = await this.versions.detect();
    if (!detected.ok) {
      return detected;
    }
    this.strategy = { version: detected.data, major: majorVersionOf(detected.data) };
    this.logger.debug('Capability strategy selected', {
      version: this.strategy.version,
      entities: this.pathFor(NativeMinimum.ENTITIES),
    });
    return ok(this.strategy);
  }

  /**
   * Native when the server reaches `minimumMajor`, else soap. Fails with
   * a CAPABILITY error only when neither path can serve.
   */
  async select<T>(
    operation: string,
    implementations: PathImplementations<T>,
    minimumMajor: number = NativeMinimum.ENTITIES
  ): Promise<EasResult<T>> {
    const resolved = await this.resolve();
    if (!resolved.ok) {
      return resolved;
    }

    if (resolved.data.major >= minimumMajor) {
      return ok(implementations.native);
    }
    if (implementations.soap !== null) {
      return ok(implementations.soap);
    }
    return fail(
      'UNSUPPORTED',
      `${operation} is not supported by protocol version ${resolved.data.version}`
    );
  }

  /** Path the entity services take for the cached strategy */
  pathFor(minimumMajor: number): ProtocolPath | null {
    if (!this.strategy) {
      return null;
    }
    return this.strategy.major >= minimumMajor ? 'native' : 'soap';
  }

  reset(): void {
    this.strategy = null;
  }
}
