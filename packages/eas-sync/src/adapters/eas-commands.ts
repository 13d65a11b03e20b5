/**
 * @exsync/eas-sync - Native Collection Commands
 *
 * The Sync and MoveItems round trips the native entity adapters share:
 * folder lookup, item Add/Change/Delete with per-item status checks,
 * single-item moves and a full collection download.
 */

import { randomUUID } from 'crypto';

import { getLogger } from '@exsync/logger';

import { err, fail, ok } from '../interfaces/result';
import { ZERO_SYNC_KEY } from '../interfaces/types';
import { buildMoveItems } from '../protocol/request-builder';
import {
  MOVE_SUCCESS_STATUSES,
  SyncStatus,
  parseMoveItems,
  parseSyncResponse,
  parseSyncResponses,
  syncStatusError,
} from '../protocol/response-parsers';
import { applyDelta } from '../sync/sync-state';

import type { ILogger } from '@exsync/logger';
import type { CommandExecutor, FolderResolver, SyncTokens } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { RawSyncItem, SyncItemResponse, SyncResponse } from '../interfaces/types';
import type { SyncWithBodyOptions } from '../protocol/request-builder';

/** Upper bound on MoreAvailable rounds in one collection download */
export const MAX_SYNC_ROUNDS = 50;

export interface NativeAdapterDeps {
  executor: CommandExecutor;
  folders: FolderResolver;
  tokens: SyncTokens;
  logger?: ILogger;
}

interface ItemCommandReply {
  sync: SyncResponse;
  responses: SyncItemResponse[];
}

function parseItemCommandReply(xml: string): ItemCommandReply {
  return { sync: parseSyncResponse(xml), responses: parseSyncResponses(xml) };
}

/** 32 hex characters, unique per Add */
export function generateClientId(): string {
  return randomUUID().replace(/-/g, '');
}

export class EasCollectionCommands {
  readonly logger: ILogger;

  constructor(
    private readonly deps: NativeAdapterDeps,
    component: string
  ) {
    this.logger = deps.logger ?? getLogger().child({ component });
  }

  /** Collection id of the well-known folder, or "<label> folder not found" */
  async resolveCollection(folderType: number, label: string): Promise<EasResult<string>> {
    const resolved = await this.deps.folders.resolveFolderId(folderType);
    if (!resolved.ok) {
      return resolved;
    }
    if (resolved.data === null) {
      return fail('FOLDER_NOT_FOUND', `${label} folder not found`);
    }
    return ok(resolved.data);
  }

  async refreshHierarchy(): Promise<EasResult<boolean>> {
    return this.deps.folders.refreshHierarchy();
  }

  /** Fresh token from the zero key; item commands run against it */
  async freshToken(collectionId: string): Promise<EasResult<string>> {
    return this.deps.tokens.refresh(collectionId, ZERO_SYNC_KEY);
  }

  /**
   * The collection's committed token, so an item command does not rebase
   * a collection the caller is syncing incrementally. Handshakes only
   * when none is held.
   */
  async currentToken(collectionId: string): Promise<EasResult<string>> {
    const token = this.deps.tokens.getToken(collectionId);
    return token === ZERO_SYNC_KEY ? this.freshToken(collectionId) : ok(token);
  }

  // ===========================================================================
  // Item Commands
  // ===========================================================================

  /**
   * Send an Add and return the ServerId echoed for `clientId`, or for
   * the first Add response when none carries the ClientId
   */
  async add(
    operation: string,
    collectionId: string,
    clientId: string,
    body: string
  ): Promise<EasResult<string>> {
    const reply = await this.send(operation, collectionId, body);
    if (!reply.ok) {
      return reply;
    }

    const adds = reply.data.filter((response) => response.kind === 'Add');
    const add = adds.find((response) => response.clientId === clientId) ?? adds[0];
    const status = add?.status ?? null;
    if (status !== null && status !== SyncStatus.SUCCESS) {
      return err(syncStatusError(status, operation));
    }
    const serverId = add?.serverId ?? null;
    if (serverId === null) {
      return fail('MISSING_FIELD', `${operation}: response is missing ServerId`);
    }
    return ok(serverId);
  }

  async change(operation: string, collectionId: string, body: string): Promise<EasResult<boolean>> {
    const reply = await this.send(operation, collectionId, body);
    if (!reply.ok) {
      return reply;
    }

    const status = reply.data.find((response) => response.kind === 'Change')?.status ?? null;
    if (status !== null && status !== SyncStatus.SUCCESS) {
      return err(syncStatusError(status, operation));
    }
    return ok(true);
  }

  /** An item that is already gone counts as deleted */
  async delete(operation: string, collectionId: string, body: string): Promise<EasResult<boolean>> {
    const reply = await this.send(operation, collectionId, body, [SyncStatus.OBJECT_NOT_FOUND]);
    if (!reply.ok) {
      return reply;
    }

    const status = reply.data.find((response) => response.kind === 'Delete')?.status ?? null;
    if (status !== null && status !== SyncStatus.SUCCESS && status !== SyncStatus.OBJECT_NOT_FOUND) {
      return err(syncStatusError(status, operation));
    }
    return ok(true);
  }

  /**
   * MoveItems for one item; the new server id on success
   */
  async move(
    operation: string,
    serverId: string,
    srcFolderId: string,
    dstFolderId: string
  ): Promise<EasResult<string>> {
    const result = await this.deps.executor.execute(
      'MoveItems',
      buildMoveItems([{ serverId, srcFolderId }], dstFolderId),
      parseMoveItems
    );
    if (!result.ok) {
      return result;
    }

    const response = result.data.find((entry) => entry.srcMsgId === serverId) ?? result.data[0];
    if (!response) {
      return fail('MISSING_FIELD', `${operation}: response is missing Response`);
    }
    if (!MOVE_SUCCESS_STATUSES.has(response.status)) {
      return fail('STATUS_ERROR', `${operation} failed (Status ${response.status})`, {
        status: response.status,
      });
    }
    if (response.dstMsgId === null) {
      return fail('MISSING_FIELD', `${operation}: response is missing DstMsgId`);
    }
    return ok(response.dstMsgId);
  }

  // ===========================================================================
  // Collection Download
  // ===========================================================================

  /**
   * Every item of a collection: handshake from zero, then windows until
   * MoreAvailable clears. One restart from zero on an invalid key.
   */
  async downloadAll<T>(
    collectionId: string,
    parseItem: (item: RawSyncItem) => T | null,
    keyOf: (item: T) => string,
    options?: SyncWithBodyOptions
  ): Promise<EasResult<T[]>> {
    const { tokens } = this.deps;

    return tokens.withSyncKeyRetry(collectionId, async () => {
      const handshake = await tokens.refresh(collectionId, ZERO_SYNC_KEY);
      if (!handshake.ok) {
        return handshake;
      }

      let token = handshake.data;
      let items: T[] = [];
      for (let round = 0; round < MAX_SYNC_ROUNDS; round++) {
        const delta = await tokens.sync(collectionId, token, parseItem, options);
        if (!delta.ok) {
          return delta;
        }
        items = applyDelta(items, delta.data, keyOf);
        token = delta.data.nextSyncKey;
        if (!delta.data.moreAvailable) {
          return ok(items);
        }
      }

      this.logger.warn('Collection download stopped at round limit', {
        collectionId,
        rounds: MAX_SYNC_ROUNDS,
      });
      return ok(items);
    });
  }

  /**
   * Run one item command. The collection status must be 1 (or one of
   * `acceptedStatuses`); the returned key is committed.
   */
  private async send(
    operation: string,
    collectionId: string,
    body: string,
    acceptedStatuses: readonly number[] = []
  ): Promise<EasResult<SyncItemResponse[]>> {
    const result = await this.deps.executor.execute('Sync', body, parseItemCommandReply);
    if (!result.ok) {
      return result;
    }

    const { sync, responses } = result.data;
    if (sync.status !== SyncStatus.SUCCESS && !acceptedStatuses.includes(sync.status)) {
      if (sync.status === SyncStatus.INVALID_SYNC_KEY) {
        this.deps.tokens.commit(collectionId, ZERO_SYNC_KEY);
      }
      return err(syncStatusError(sync.status, operation));
    }
    if (sync.syncKey !== null) {
      this.deps.tokens.commit(collectionId, sync.syncKey);
    }

    this.logger.debug('Item command applied', { command: operation, collectionId });
    return ok(responses);
  }
}
