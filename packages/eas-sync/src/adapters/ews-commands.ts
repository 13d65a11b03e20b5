/**
 * @exsync/eas-sync - EWS Item Commands
 *
 * CreateItem, UpdateItem, DeleteItem, MoveItem and folder listing shared
 * by the EWS entity adapters. Servers below protocol 14 take these paths.
 */

import { getLogger } from '@exsync/logger';

import { fail, ok } from '../interfaces/result';
import { buildDeleteItem, buildFindItem, buildGetItem, buildMoveItem } from '../protocol/soap-builder';
import {
  extractEwsError,
  extractEwsItemId,
  extractEwsItemIds,
  isEwsItemNotFound,
  isEwsSuccess,
} from '../protocol/response-parsers';
import { resolveEwsItemId, resolveEwsItemRef } from './ews-item-ids';

import type { ILogger } from '@exsync/logger';
import type { SoapExecutor } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { EwsDeleteType, EwsItemId } from '../interfaces/types';

export interface SoapAdapterDeps {
  soap: SoapExecutor;
  logger?: ILogger;
}

/** EWS distinguished folder names */
export const DistinguishedFolder = {
  NOTES: 'notes',
  TASKS: 'tasks',
  DELETED_ITEMS: 'deleteditems',
} as const;

export class EwsItemCommands {
  readonly logger: ILogger;
  private readonly soap: SoapExecutor;

  constructor(deps: SoapAdapterDeps, component: string) {
    this.soap = deps.soap;
    this.logger = deps.logger ?? getLogger().child({ component });
  }

  /** Id of the created item */
  async create(operation: string, soapBody: string): Promise<EasResult<string>> {
    const response = await this.call(operation, 'CreateItem', soapBody);
    if (!response.ok) {
      return response;
    }
    const itemId = extractEwsItemId(response.data);
    if (itemId === null) {
      return fail('MISSING_FIELD', `${operation}: response is missing ItemId`);
    }
    return ok(itemId.id);
  }

  /**
   * Look up the item's ChangeKey in `folderId`, then send the UpdateItem
   * produced by `buildUpdate`
   */
  async update(
    operation: string,
    folderId: string,
    serverId: string,
    buildUpdate: (itemId: EwsItemId) => string
  ): Promise<EasResult<boolean>> {
    const itemId = await resolveEwsItemRef(this.soap, folderId, serverId);
    if (!itemId.ok) {
      return itemId;
    }
    const response = await this.call(operation, 'UpdateItem', buildUpdate(itemId.data));
    return response.ok ? ok(true) : response;
  }

  /** ErrorItemNotFound counts as deleted */
  async delete(
    operation: string,
    folderId: string,
    serverId: string,
    deleteType: EwsDeleteType
  ): Promise<EasResult<boolean>> {
    const itemId = await resolveEwsItemId(this.soap, folderId, serverId);
    if (!itemId.ok) {
      return itemId;
    }

    const response = await this.soap.executeEws('DeleteItem', buildDeleteItem(itemId.data, deleteType));
    if (!response.ok) {
      return response;
    }
    if (isEwsSuccess(response.data) || isEwsItemNotFound(response.data)) {
      return ok(true);
    }
    return fail('STATUS_ERROR', `${operation} failed: ${extractEwsError(response.data)}`);
  }

  /** New id of the moved item */
  async move(
    operation: string,
    folderId: string,
    serverId: string,
    toFolderId: string
  ): Promise<EasResult<string>> {
    const itemId = await resolveEwsItemId(this.soap, folderId, serverId);
    if (!itemId.ok) {
      return itemId;
    }
    const response = await this.call(operation, 'MoveItem', buildMoveItem(itemId.data, toFolderId));
    if (!response.ok) {
      return response;
    }
    const moved = extractEwsItemId(response.data);
    if (moved === null) {
      return fail('MISSING_FIELD', `${operation}: response is missing ItemId`);
    }
    return ok(moved.id);
  }

  /**
   * Full items of a folder: FindItem for the ids, then GetItem for the
   * bodies FindItem leaves out
   */
  async listItems<T>(folderId: string, parse: (xml: string) => T[]): Promise<EasResult<T[]>> {
    const found = await this.call(`List ${folderId}`, 'FindItem', buildFindItem(folderId));
    if (!found.ok) {
      return found;
    }
    const ids = extractEwsItemIds(found.data);
    if (ids.length === 0) {
      return ok([]);
    }

    const items = await this.call(`Fetch ${folderId}`, 'GetItem', buildGetItem(ids));
    return items.ok ? ok(parse(items.data)) : items;
  }

  private async call(operation: string, action: string, soapBody: string): Promise<EasResult<string>> {
    const response = await this.soap.executeEws(action, soapBody);
    if (!response.ok) {
      return response;
    }
    if (!isEwsSuccess(response.data)) {
      const message = extractEwsError(response.data);
      this.logger.warn('EWS call failed', { command: action, message });
      const code = isEwsItemNotFound(response.data) ? 'ITEM_NOT_FOUND' : 'STATUS_ERROR';
      return fail(code, `${operation} failed: ${message}`);
    }
    return ok(response.data);
  }
}
