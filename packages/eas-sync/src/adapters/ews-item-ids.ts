/**
 * @exsync/eas-sync - EWS Item Ids
 *
 * Callers may hold either an EWS ItemId or an ActiveSync server id
 * ("collection:index") for the same item. EWS commands need the former.
 */

import { fail, ok } from '../interfaces/result';
import { buildFindItem, buildGetItem } from '../protocol/soap-builder';
import {
  extractEwsError,
  extractEwsItemId,
  extractEwsItemIds,
  isEwsSuccess,
} from '../protocol/response-parsers';

import type { SoapExecutor } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { EwsItemId } from '../interfaces/types';

/** EWS ids are long base64 strings; ActiveSync ids are short and contain ':' */
const MIN_EWS_ID_LENGTH = 50;
const LOOKUP_LIMIT = 500;

export function isEwsItemId(serverId: string): boolean {
  return serverId.length >= MIN_EWS_ID_LENGTH && !serverId.includes(':');
}

/**
 * EWS id for `serverId`. An ActiveSync id is mapped by its 1-based index
 * into the folder listing. An index past the end of the listing is
 * ITEM_NOT_FOUND, never another item.
 */
export async function resolveEwsItemId(
  soap: SoapExecutor,
  distinguishedFolderId: string,
  serverId: string
): Promise<EasResult<string>> {
  if (isEwsItemId(serverId)) {
    return ok(serverId);
  }

  const index = parseInt(serverId.split(':').pop() ?? '', 10) - 1;
  if (isNaN(index) || index < 0) {
    return fail('ITEM_NOT_FOUND', `Cannot map item id ${serverId} to an EWS item`);
  }

  const response = await soap.executeEws(
    'FindItem',
    buildFindItem(distinguishedFolderId, { maxEntries: LOOKUP_LIMIT, baseShape: 'IdOnly' })
  );
  if (!response.ok) {
    return response;
  }
  if (!isEwsSuccess(response.data)) {
    return fail('STATUS_ERROR', `FindItem failed: ${extractEwsError(response.data)}`);
  }

  const ids = extractEwsItemIds(response.data);
  const id = ids[index];
  if (id === undefined) {
    return fail(
      'ITEM_NOT_FOUND',
      `Item ${serverId} not found in ${distinguishedFolderId}: ` +
        `position ${index + 1} is past the ${ids.length} listed items`
    );
  }
  return ok(id);
}

/**
 * Id plus the current ChangeKey, which UpdateItem requires
 */
export async function resolveEwsItemRef(
  soap: SoapExecutor,
  distinguishedFolderId: string,
  serverId: string
): Promise<EasResult<EwsItemId>> {
  const resolved = await resolveEwsItemId(soap, distinguishedFolderId, serverId);
  if (!resolved.ok) {
    return resolved;
  }

  const response = await soap.executeEws('GetItem', buildGetItem([resolved.data]));
  if (!response.ok) {
    return response;
  }
  if (!isEwsSuccess(response.data)) {
    return fail('ITEM_NOT_FOUND', `GetItem failed: ${extractEwsError(response.data)}`);
  }

  const itemId = extractEwsItemId(response.data);
  if (itemId === null) {
    return fail('MISSING_FIELD', 'GetItem: response is missing ItemId');
  }
  return ok(itemId);
}
