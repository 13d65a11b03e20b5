/**
 * @exsync/eas-sync - Sync State
 *
 * Per-collection sync tokens. A collection is UNSYNCED (zero token) or
 * SYNCED with the last token the server confirmed. A token only moves
 * after a response parsed completely with Status 1; "invalid sync key"
 * sends the collection back to UNSYNCED.
 *
 * Persisting tokens is the caller's job: checkpoint `nextSyncKey` right
 * after the delta it came with has been applied, and `restore()` it on
 * the next session.
 */

import { getLogger } from '@exsync/logger';

import { EasError } from '../interfaces/errors';
import { err, ok } from '../interfaces/result';
import { buildSyncInitial, buildSyncKeyRefresh, buildSyncWithBody } from '../protocol/request-builder';
import { SyncStatus, parseSyncResponse, syncStatusError } from '../protocol/response-parsers';
import { ZERO_SYNC_KEY } from '../interfaces/types';

import type { ILogger } from '@exsync/logger';
import type { CollectionSyncer, CommandExecutor, SyncKeyRefresher } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { SyncWithBodyOptions } from '../protocol/request-builder';
import type { RawSyncItem, SyncDelta, SyncResponse } from '../interfaces/types';

export type CollectionState = { kind: 'UNSYNCED' } | { kind: 'SYNCED'; token: string };

export class SyncStateStore implements SyncKeyRefresher, CollectionSyncer {
  private readonly tokens = new Map<string, string>();
  private readonly logger: ILogger;

  constructor(
    private readonly executor: CommandExecutor,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'SyncState' });
  }

  // ===========================================================================
  // State
  // ===========================================================================

  getState(collectionId: string): CollectionState {
    const token = this.tokens.get(collectionId);
    return token === undefined ? { kind: 'UNSYNCED' } : { kind: 'SYNCED', token };
  }

  getToken(collectionId: string): string {
    return this.tokens.get(collectionId) ?? ZERO_SYNC_KEY;
  }

  /**
   * Load a checkpointed token, for example from the caller's database
   */
  restore(collectionId: string, token: string): void {
    this.commit(collectionId, token);
  }

  commit(collectionId: string, token: string): void {
    if (token === ZERO_SYNC_KEY) {
      this.reset(collectionId);
      return;
    }
    this.tokens.set(collectionId, token);
  }

  /** Back to UNSYNCED; repeated calls change nothing */
  reset(collectionId: string): void {
    this.tokens.delete(collectionId);
  }

  clear(): void {
    this.tokens.clear();
  }

  // ===========================================================================
  // Protocol Operations
  // ===========================================================================

  /**
   * Obtain a current token. From the zero token this is the initial
   * handshake, which carries no items; otherwise a one-item window.
   */
  async refresh(collectionId: string, baseToken: string): Promise<EasResult<string>> {
    const body =
      baseToken === ZERO_SYNC_KEY
        ? buildSyncInitial(collectionId)
        : buildSyncKeyRefresh(baseToken, collectionId);

    const result = await this.executor.execute('Sync', body, parseSyncResponse);
    if (!result.ok) {
      return result;
    }

    const checked = this.checkStatus(collectionId, result.data, 'Sync key refresh');
    if (!checked.ok) {
      return checked;
    }

    // An empty reply to a non-zero key leaves that key valid
    const token = result.data.syncKey ?? (baseToken === ZERO_SYNC_KEY ? null : baseToken);
    if (token === null) {
      return err(new EasError('Sync key refresh: response is missing SyncKey', 'MISSING_FIELD'));
    }

    this.commit(collectionId, token);
    return ok(token);
  }

  /**
   * Fetch one window of changes after `token`. Items `parseItem` rejects
   * are dropped; deletes are reported separately and never reordered
   * against adds.
   */
  async sync<T>(
    collectionId: string,
    token: string,
    parseItem: (item: RawSyncItem) => T | null,
    options: SyncWithBodyOptions = {}
  ): Promise<EasResult<SyncDelta<T>>> {
    const body = buildSyncWithBody(token, collectionId, options);
    const result = await this.executor.execute('Sync', body, parseSyncResponse);
    if (!result.ok) {
      return result;
    }

    const response = result.data;
    const checked = this.checkStatus(collectionId, response, 'Sync');
    if (!checked.ok) {
      return checked;
    }

    const nextSyncKey = response.syncKey ?? (token === ZERO_SYNC_KEY ? null : token);
    if (nextSyncKey === null) {
      return err(new EasError('Sync: response is missing SyncKey', 'MISSING_FIELD'));
    }

    const parseAll = (items: RawSyncItem[]): T[] =>
      items.map(parseItem).filter((item): item is T => item !== null);

    const delta: SyncDelta<T> = {
      collectionId,
      added: parseAll(response.added),
      changed: parseAll(response.changed),
      deleted: response.deleted,
      moreAvailable: response.moreAvailable,
      nextSyncKey,
    };

    this.commit(collectionId, nextSyncKey);
    this.logger.debug('Collection synced', {
      collectionId,
      added: delta.added.length,
      changed: delta.changed.length,
      deleted: delta.deleted.length,
      moreAvailable: delta.moreAvailable,
    });
    return ok(delta);
  }

  /**
   * Run `operation`; when it fails with an invalid sync key, the
   * collection has already been reset, so run it once more from zero
   */
  async withSyncKeyRetry<T>(
    collectionId: string,
    operation: () => Promise<EasResult<T>>
  ): Promise<EasResult<T>> {
    const first = await operation();
    if (first.ok || first.error.code !== 'INVALID_SYNC_KEY') {
      return first;
    }
    this.logger.warn('Invalid sync key, restarting collection from zero', { collectionId });
    this.reset(collectionId);
    return operation();
  }

  private checkStatus(collectionId: string, response: SyncResponse, operation: string): EasResult<true> {
    if (response.status === SyncStatus.SUCCESS) {
      return ok(true);
    }
    if (response.status === SyncStatus.INVALID_SYNC_KEY) {
      this.reset(collectionId);
    }
    return err(syncStatusError(response.status, operation));
  }
}

/**
 * Merge a delta into a local list: remove deletes, then upsert adds and
 * changes by key
 */
export function applyDelta<T>(
  current: readonly T[],
  delta: Pick<SyncDelta<T>, 'added' | 'changed' | 'deleted'>,
  keyOf: (item: T) => string
): T[] {
  const deleted = new Set(delta.deleted);
  const merged = new Map<string, T>();
  for (const item of current) {
    if (!deleted.has(keyOf(item))) {
      merged.set(keyOf(item), item);
    }
  }
  for (const item of [...delta.added, ...delta.changed]) {
    merged.set(keyOf(item), item);
  }
  return Array.from(merged.values());
}
