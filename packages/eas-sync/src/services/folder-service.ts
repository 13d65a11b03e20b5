/**
 * @exsync/eas-sync - Folder Service
 *
 * Folder hierarchy over FolderSync and the folder commands. Also serves
 * as the well-known folder lookup the entity services resolve through.
 */

import { getLogger } from '@exsync/logger';

import { err, fail, ok } from '../interfaces/result';
import { FolderType, ZERO_SYNC_KEY, isSystemFolder } from '../interfaces/types';
import {
  buildFolderCreate,
  buildFolderDelete,
  buildFolderSync,
  buildFolderUpdate,
} from '../protocol/request-builder';
import {
  STATUS_SUCCESS,
  folderStatusError,
  parseFolderCommand,
  parseFolderSync,
} from '../protocol/response-parsers';

import type { ILogger } from '@exsync/logger';
import type { CommandExecutor, FolderResolver } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { Folder, FolderSyncResult } from '../interfaces/types';

const FOLDER_SYNC_INVALID_KEY = 9;

export class FolderService implements FolderResolver {
  private hierarchyKey: string = ZERO_SYNC_KEY;
  private readonly folders = new Map<string, Folder>();
  private readonly logger: ILogger;

  constructor(
    private readonly executor: CommandExecutor,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'Folders' });
  }

  /**
   * Sync the hierarchy from `syncKey` (zero for the full tree). The local
   * cache follows the reported adds, updates and deletes.
   */
  async folderSync(syncKey: string = ZERO_SYNC_KEY): Promise<EasResult<FolderSyncResult>> {
    const result = await this.executor.execute('FolderSync', buildFolderSync(syncKey), parseFolderSync);
    if (!result.ok) {
      return result;
    }

    const response = result.data;
    if (response.status !== STATUS_SUCCESS) {
      if (response.status === FOLDER_SYNC_INVALID_KEY) {
        this.hierarchyKey = ZERO_SYNC_KEY;
      }
      return err(folderStatusError(response.status, 'FolderSync'));
    }
    if (response.syncKey === null) {
      return fail('MISSING_FIELD', 'FolderSync: response is missing SyncKey');
    }

    if (syncKey === ZERO_SYNC_KEY) {
      this.folders.clear();
    }
    for (const id of response.deleted) {
      this.folders.delete(id);
    }
    for (const folder of [...response.added, ...response.updated]) {
      this.folders.set(folder.serverId, folder);
    }
    this.hierarchyKey = response.syncKey;

    this.logger.debug('Folder hierarchy synced', { folders: this.folders.size });
    return ok(response);
  }

  getFolders(): Folder[] {
    return Array.from(this.folders.values());
  }

  /**
   * First folder of `type`, from the cache or a fresh full FolderSync.
   * `null` when the mailbox has none.
   */
  async findFolderByType(type: number): Promise<EasResult<Folder | null>> {
    const cached = this.getFolders().find((folder) => folder.type === type);
    if (cached) {
      return ok(cached);
    }
    const synced = await this.folderSync(ZERO_SYNC_KEY);
    if (!synced.ok) {
      return synced;
    }
    return ok(synced.data.added.find((folder) => folder.type === type) ?? null);
  }

  async refreshHierarchy(): Promise<EasResult<boolean>> {
    const synced = await this.folderSync(ZERO_SYNC_KEY);
    return synced.ok ? ok(true) : synced;
  }

  async resolveFolderId(type: number): Promise<EasResult<string | null>> {
    const folder = await this.findFolderByType(type);
    return folder.ok ? ok(folder.data?.serverId ?? null) : folder;
  }

  // ===========================================================================
  // Folder Commands
  // ===========================================================================

  async createFolder(
    displayName: string,
    parentId: string = '0',
    type: number = FolderType.USER_CREATED
  ): Promise<EasResult<string>> {
    const key = await this.currentKey();
    if (!key.ok) {
      return key;
    }

    const result = await this.executor.execute(
      'FolderCreate',
      buildFolderCreate(key.data, parentId, displayName, type),
      (xml) => parseFolderCommand(xml, 'FolderCreate')
    );
    if (!result.ok) {
      return result;
    }
    if (result.data.status !== STATUS_SUCCESS) {
      return err(folderStatusError(result.data.status, 'FolderCreate'));
    }
    if (result.data.serverId === null) {
      return fail('MISSING_FIELD', 'FolderCreate: response is missing ServerId');
    }

    this.advance(result.data.syncKey);
    this.folders.set(result.data.serverId, { serverId: result.data.serverId, displayName, parentId, type });
    return ok(result.data.serverId);
  }

  async deleteFolder(serverId: string): Promise<EasResult<boolean>> {
    const guard = this.guardSystemFolder(serverId, 'FolderDelete');
    if (!guard.ok) {
      return guard;
    }
    const key = await this.currentKey();
    if (!key.ok) {
      return key;
    }

    const result = await this.executor.execute(
      'FolderDelete',
      buildFolderDelete(key.data, serverId),
      (xml) => parseFolderCommand(xml, 'FolderDelete')
    );
    if (!result.ok) {
      return result;
    }
    if (result.data.status !== STATUS_SUCCESS) {
      return err(folderStatusError(result.data.status, 'FolderDelete'));
    }

    this.advance(result.data.syncKey);
    this.folders.delete(serverId);
    return ok(true);
  }

  async renameFolder(serverId: string, displayName: string): Promise<EasResult<boolean>> {
    const guard = this.guardSystemFolder(serverId, 'FolderUpdate');
    if (!guard.ok) {
      return guard;
    }
    const key = await this.currentKey();
    if (!key.ok) {
      return key;
    }

    const parentId = this.folders.get(serverId)?.parentId ?? '0';
    const result = await this.executor.execute(
      'FolderUpdate',
      buildFolderUpdate(key.data, serverId, parentId, displayName),
      (xml) => parseFolderCommand(xml, 'FolderUpdate')
    );
    if (!result.ok) {
      return result;
    }
    if (result.data.status !== STATUS_SUCCESS) {
      return err(folderStatusError(result.data.status, 'FolderUpdate'));
    }

    this.advance(result.data.syncKey);
    const existing = this.folders.get(serverId);
    if (existing) {
      this.folders.set(serverId, { ...existing, displayName });
    }
    return ok(true);
  }

  reset(): void {
    this.hierarchyKey = ZERO_SYNC_KEY;
    this.folders.clear();
  }

  /** Folder commands need a non-zero hierarchy key */
  private async currentKey(): Promise<EasResult<string>> {
    if (this.hierarchyKey !== ZERO_SYNC_KEY) {
      return ok(this.hierarchyKey);
    }
    const synced = await this.folderSync(ZERO_SYNC_KEY);
    return synced.ok ? ok(this.hierarchyKey) : synced;
  }

  private advance(syncKey: string | null): void {
    if (syncKey !== null) {
      this.hierarchyKey = syncKey;
    }
  }

  private guardSystemFolder(serverId: string, operation: string): EasResult<true> {
    const folder = this.folders.get(serverId);
    if (folder && isSystemFolder(folder.type)) {
      return err(folderStatusError(3, operation));
    }
    return ok(true);
  }
}
