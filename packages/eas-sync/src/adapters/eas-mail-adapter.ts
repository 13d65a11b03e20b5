/**
 * @exsync/eas-sync - Native Mail Adapter
 */

import { ok } from '../interfaces/result';
import { FolderType, ZERO_SYNC_KEY } from '../interfaces/types';
import { parseMailChange, parseMailItem } from '../protocol/item-parsers';
import { buildMailReadChange, buildSyncDelete } from '../protocol/request-builder';
import { EasCollectionCommands } from './eas-commands';

import type { MailBackend } from '../interfaces/backends';
import type { SyncTokens } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { MailSyncDelta, RawSyncItem } from '../interfaces/types';
import type { NativeAdapterDeps } from './eas-commands';

const raw = (item: RawSyncItem): RawSyncItem => item;

export class EasMailAdapter implements MailBackend {
  private readonly commands: EasCollectionCommands;
  private readonly tokens: SyncTokens;

  constructor(deps: NativeAdapterDeps) {
    this.commands = new EasCollectionCommands(deps, 'EasMail');
    this.tokens = deps.tokens;
  }

  async syncFolder(collectionId: string, syncKey: string): Promise<EasResult<MailSyncDelta>> {
    let token = syncKey;
    if (token === ZERO_SYNC_KEY) {
      const handshake = await this.tokens.refresh(collectionId, ZERO_SYNC_KEY);
      if (!handshake.ok) {
        return handshake;
      }
      token = handshake.data;
    }

    const delta = await this.tokens.sync(collectionId, token, raw);
    if (!delta.ok) {
      return delta;
    }
    return ok({
      ...delta.data,
      added: delta.data.added.map(parseMailItem),
      changed: delta.data.changed.map(parseMailChange),
    });
  }

  async deleteEmail(collectionId: string, serverId: string): Promise<EasResult<boolean>> {
    return this.deleteIn(collectionId, serverId, true);
  }

  async deleteEmailPermanently(serverId: string): Promise<EasResult<boolean>> {
    const deletedId = await this.commands.resolveCollection(FolderType.DELETED_ITEMS, 'Deleted Items');
    if (!deletedId.ok) {
      return deletedId;
    }
    return this.deleteIn(deletedId.data, serverId, false);
  }

  async markRead(collectionId: string, serverId: string, read: boolean): Promise<EasResult<boolean>> {
    const syncKey = await this.commands.currentToken(collectionId);
    if (!syncKey.ok) {
      return syncKey;
    }
    const request = buildMailReadChange(syncKey.data, collectionId, serverId, read);
    return this.commands.change(read ? 'Mark read' : 'Mark unread', collectionId, request);
  }

  private async deleteIn(
    collectionId: string,
    serverId: string,
    deletesAsMoves: boolean
  ): Promise<EasResult<boolean>> {
    const syncKey = await this.commands.currentToken(collectionId);
    if (!syncKey.ok) {
      return syncKey;
    }
    const request = buildSyncDelete(syncKey.data, collectionId, serverId, deletesAsMoves);
    const operation = deletesAsMoves ? 'Delete email' : 'Permanently delete email';
    return this.commands.delete(operation, collectionId, request);
  }
}
