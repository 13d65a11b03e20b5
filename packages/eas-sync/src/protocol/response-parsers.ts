/**
 * @exsync/eas-sync - Response Parsers
 *
 * Structured views over EAS and EWS responses, composed from the
 * extractor primitives. A parser throws an EasError only when a field the
 * caller cannot do without is missing; the transport turns that into an
 * error result.
 */

import { EasError } from '../interfaces/errors';
import {
  extractAttribute,
  extractBlock,
  extractBlocks,
  extractGal,
  extractInt,
  extractValue,
  hasElement,
} from './xml-extractor';
import { unescapeXml } from './xml-escape';

import type {
  Folder,
  FolderSyncResult,
  GalContact,
  MailboxSearchHit,
  MoveItemResponse,
  RawSyncItem,
  SyncItemResponse,
  SyncResponse,
  EwsItemId,
} from '../interfaces/types';
import type { EasErrorCode } from '../interfaces/errors';

// =============================================================================
// Status Codes
// =============================================================================

export const STATUS_SUCCESS = 1;

/** Sync command Status values */
export const SyncStatus = {
  SUCCESS: 1,
  INVALID_SYNC_KEY: 3,
  PROTOCOL_ERROR: 4,
  SERVER_ERROR: 5,
  CONVERSION_ERROR: 6,
  CONFLICT: 7,
  OBJECT_NOT_FOUND: 8,
  QUOTA_EXCEEDED: 9,
  HIERARCHY_CHANGED: 12,
} as const;

/** MoveItems Status values that mean the item now lives in the destination */
export const MOVE_SUCCESS_STATUSES: ReadonlySet<number> = new Set([3, 4, 6]);

const SYNC_STATUS_CODES: Record<number, EasErrorCode> = {
  [SyncStatus.INVALID_SYNC_KEY]: 'INVALID_SYNC_KEY',
  [SyncStatus.OBJECT_NOT_FOUND]: 'ITEM_NOT_FOUND',
  [SyncStatus.QUOTA_EXCEEDED]: 'SIZE_EXCEEDED',
  [SyncStatus.HIERARCHY_CHANGED]: 'FOLDER_NOT_FOUND',
};

const SYNC_STATUS_MESSAGES: Record<number, string> = {
  [SyncStatus.INVALID_SYNC_KEY]: 'Invalid sync key',
  [SyncStatus.PROTOCOL_ERROR]: 'Protocol error',
  [SyncStatus.SERVER_ERROR]: 'Server error',
  [SyncStatus.CONVERSION_ERROR]: 'Item rejected by server',
  [SyncStatus.CONFLICT]: 'Conflicting change on server',
  [SyncStatus.OBJECT_NOT_FOUND]: 'Item not found',
  [SyncStatus.QUOTA_EXCEEDED]: 'Mailbox quota or size limit exceeded',
  [SyncStatus.HIERARCHY_CHANGED]: 'Folder hierarchy changed',
};

/**
 * Typed error for a non-success Sync status
 */
export function syncStatusError(status: number, operation: string): EasError {
  const code = SYNC_STATUS_CODES[status] ?? 'STATUS_ERROR';
  const detail = SYNC_STATUS_MESSAGES[status] ?? 'Unexpected status';
  return new EasError(`${operation} failed: ${detail} (Status ${status})`, code, { status });
}

const FOLDER_STATUS_MESSAGES: Record<number, string> = {
  2: 'A folder with that name already exists',
  3: 'System folders cannot be changed',
  4: 'Folder does not exist',
  5: 'Parent folder not found',
  6: 'Server error',
  9: 'Invalid folder sync key',
  10: 'Malformed request',
};

export function folderStatusError(status: number, operation: string): EasError {
  const detail = FOLDER_STATUS_MESSAGES[status] ?? 'Unexpected status';
  let code: EasErrorCode = 'STATUS_ERROR';
  if (status === 4 || status === 5) {
    code = 'FOLDER_NOT_FOUND';
  } else if (status === 9) {
    code = 'INVALID_SYNC_KEY';
  }
  return new EasError(`${operation} failed: ${detail} (Status ${status})`, code, { status });
}

function requireInt(xml: string, tag: string, operation: string): number {
  const value = extractInt(xml, tag);
  if (value === null) {
    throw new EasError(`${operation}: response is missing ${tag}`, 'MISSING_FIELD');
  }
  return value;
}

// =============================================================================
// FolderSync
// =============================================================================

function parseFolder(block: string): Folder | null {
  const serverId = extractValue(block, 'ServerId');
  if (serverId === null) {
    return null;
  }
  return {
    serverId,
    displayName: unescapeXml(extractValue(block, 'DisplayName') ?? ''),
    parentId: extractValue(block, 'ParentId') || '0',
    type: extractInt(block, 'Type') ?? 1,
  };
}

function parseFolders(blocks: string[]): Folder[] {
  return blocks.map(parseFolder).filter((folder): folder is Folder => folder !== null);
}

export function parseFolderSync(xml: string): FolderSyncResult {
  const status = requireInt(xml, 'Status', 'FolderSync');
  const changes = extractBlock(xml, 'Changes') ?? xml;

  // Some servers list the hierarchy as bare Folder elements instead of Add
  const addBlocks = extractBlocks(changes, 'Add');
  const added = parseFolders(addBlocks.length > 0 ? addBlocks : extractBlocks(changes, 'Folder'));

  return {
    status,
    syncKey: extractValue(xml, 'SyncKey'),
    added,
    updated: parseFolders(extractBlocks(changes, 'Update')),
    deleted: extractBlocks(changes, 'Delete')
      .map((block) => extractValue(block, 'ServerId'))
      .filter((id): id is string => id !== null),
  };
}

export interface FolderCommandResult {
  status: number;
  syncKey: string | null;
  /** Set by FolderCreate only */
  serverId: string | null;
}

/**
 * FolderCreate, FolderDelete and FolderUpdate share one response shape
 */
export function parseFolderCommand(xml: string, command: string): FolderCommandResult {
  return {
    status: requireInt(xml, 'Status', command),
    syncKey: extractValue(xml, 'SyncKey'),
    serverId: extractValue(xml, 'ServerId'),
  };
}

// =============================================================================
// Sync
// =============================================================================

function stripBlock(xml: string, tag: string): string {
  const block = extractBlock(xml, tag);
  return block === null ? xml : xml.replace(block, '');
}

function parseRawItems(commands: string, tag: string): RawSyncItem[] {
  const items: RawSyncItem[] = [];
  for (const block of extractBlocks(commands, tag)) {
    const serverId = extractValue(block, 'ServerId');
    if (serverId !== null) {
      items.push({ serverId, applicationData: extractBlock(block, 'ApplicationData') ?? '' });
    }
  }
  return items;
}

function parseDeletedIds(commands: string): string[] {
  return [...extractBlocks(commands, 'Delete'), ...extractBlocks(commands, 'SoftDelete')]
    .map((block) => extractValue(block, 'ServerId'))
    .filter((id): id is string => id !== null);
}

/**
 * Single-collection Sync reply. Items are read from Commands only, so the
 * per-item Responses block never leaks into the added list.
 */
export function parseSyncResponse(xml: string): SyncResponse {
  const collection = extractBlock(xml, 'Collection') ?? xml;
  const commands = extractBlock(collection, 'Commands') ?? '';
  const header = stripBlock(stripBlock(collection, 'Commands'), 'Responses');

  const status = extractInt(header, 'Status') ?? requireInt(xml, 'Status', 'Sync');

  return {
    status,
    syncKey: extractValue(header, 'SyncKey'),
    moreAvailable: hasElement(header, 'MoreAvailable'),
    added: parseRawItems(commands, 'Add'),
    changed: parseRawItems(commands, 'Change'),
    deleted: parseDeletedIds(commands),
  };
}

const RESPONSE_KINDS: ReadonlyArray<SyncItemResponse['kind']> = ['Add', 'Change', 'Delete', 'Fetch'];

/**
 * Per-item outcomes from the Responses block of a Sync reply
 */
export function parseSyncResponses(xml: string): SyncItemResponse[] {
  const responses = extractBlock(xml, 'Responses');
  if (responses === null) {
    return [];
  }
  return RESPONSE_KINDS.flatMap((kind) =>
    extractBlocks(responses, kind).map((block) => ({
      kind,
      serverId: extractValue(block, 'ServerId'),
      clientId: extractValue(block, 'ClientId'),
      status: extractInt(block, 'Status'),
    }))
  );
}

// =============================================================================
// MoveItems
// =============================================================================

export function parseMoveItems(xml: string): MoveItemResponse[] {
  const responses: MoveItemResponse[] = [];
  for (const block of extractBlocks(xml, 'Response')) {
    const srcMsgId = extractValue(block, 'SrcMsgId');
    if (srcMsgId === null) {
      continue;
    }
    responses.push({
      srcMsgId,
      dstMsgId: extractValue(block, 'DstMsgId'),
      status: extractInt(block, 'Status') ?? 0,
    });
  }
  return responses;
}

// =============================================================================
// Search
// =============================================================================

/**
 * GAL results. An empty list is returned unless the search Status is 1.
 */
export function parseGalResults(xml: string): GalContact[] {
  if (extractInt(xml, 'Status') !== STATUS_SUCCESS) {
    return [];
  }

  const contacts: GalContact[] = [];
  for (const result of extractBlocks(xml, 'Result')) {
    const properties = extractBlock(result, 'Properties') ?? result;
    const field = (tag: string): string => unescapeXml(extractGal(properties, tag) ?? '');

    const contact: GalContact = {
      displayName: field('DisplayName'),
      email: field('EmailAddress'),
      firstName: field('FirstName'),
      lastName: field('LastName'),
      company: field('Company'),
      department: field('Office'),
      jobTitle: field('Title'),
      phone: field('Phone'),
      mobilePhone: field('MobilePhone'),
      alias: field('Alias'),
    };
    if (contact.displayName || contact.email) {
      contacts.push(contact);
    }
  }
  return contacts;
}

export function parseMailboxSearch(xml: string): MailboxSearchHit[] {
  if (extractInt(xml, 'Status') !== STATUS_SUCCESS) {
    return [];
  }

  const hits: MailboxSearchHit[] = [];
  for (const result of extractBlocks(xml, 'Result')) {
    const serverId = extractValue(result, 'LongId') ?? extractValue(result, 'ServerId');
    if (serverId === null) {
      continue;
    }
    const properties = extractBlock(result, 'Properties') ?? '';
    hits.push({
      serverId,
      collectionId: extractValue(result, 'CollectionId') ?? '',
      subject: unescapeXml(extractValue(properties, 'Subject') ?? ''),
      from: unescapeXml(extractValue(properties, 'From') ?? ''),
      dateReceived: extractValue(properties, 'DateReceived') ?? '',
      preview: unescapeXml(extractValue(extractBlock(properties, 'Body') ?? '', 'Data') ?? ''),
    });
  }
  return hits;
}

// =============================================================================
// Provision
// =============================================================================

export interface ProvisionResult {
  status: number;
  policyKey: string | null;
  policyStatus: number | null;
}

export function parseProvision(xml: string): ProvisionResult {
  const policy = extractBlock(xml, 'Policy') ?? '';
  return {
    status: requireInt(xml, 'Status', 'Provision'),
    policyKey: extractValue(policy, 'PolicyKey'),
    policyStatus: extractInt(policy, 'Status'),
  };
}

// =============================================================================
// EWS
// =============================================================================

/**
 * Both the ResponseClass attribute and the ResponseCode must agree
 */
export function isEwsSuccess(xml: string): boolean {
  const responseClass = /ResponseClass="([^"]*)"/.exec(xml)?.[1];
  return responseClass === 'Success' && extractValue(xml, 'ResponseCode') === 'NoError';
}

export function isEwsItemNotFound(xml: string): boolean {
  return extractValue(xml, 'ResponseCode') === 'ErrorItemNotFound';
}

export function extractEwsItemId(xml: string): EwsItemId | null {
  const id = extractAttribute(xml, 'ItemId', 'Id');
  if (id === null) {
    return null;
  }
  return { id, changeKey: extractAttribute(xml, 'ItemId', 'ChangeKey') };
}

/**
 * Every ItemId in document order
 */
export function extractEwsItemIds(xml: string): string[] {
  return Array.from(xml.matchAll(/<(?:t:)?ItemId\s[^>]*?\bId="([^"]*)"/g), (match) => match[1] ?? '');
}

export function extractEwsError(xml: string): string {
  return (
    extractValue(xml, 'MessageText') ??
    extractValue(xml, 'ResponseCode') ??
    extractValue(xml, 'faultstring') ??
    'Unknown EWS error'
  );
}
