/**
 * @exsync/eas-sync - Request Builder
 *
 * Pure functions producing ActiveSync request bodies. Every value that
 * reaches the output passes through `text()` (or `escapeXml` for
 * attributes), so callers hand over raw strings and never pre-escape.
 */

import { escapeXml } from './xml-escape';

import type { MoveSource, TaskImportance } from '../interfaces/types';

// =============================================================================
// Constants
// =============================================================================

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export const NOTE_MESSAGE_CLASS = 'IPM.StickyNote';

export const DEFAULT_WINDOW_SIZE = 100;
export const DEFAULT_TRUNCATION_SIZE = 200000;
export const DEFAULT_GAL_RESULTS = 2000;

/** airsyncbase:Type values */
export const BodyType = {
  PLAIN_TEXT: 1,
  HTML: 2,
  RTF: 3,
  MIME: 4,
} as const;

type Namespaces = Record<string, string>;

const AIRSYNC: Namespaces = { '': 'AirSync' };
const AIRSYNC_BASE: Namespaces = { '': 'AirSync', airsyncbase: 'AirSyncBase' };
const AIRSYNC_NOTES: Namespaces = { '': 'AirSync', airsyncbase: 'AirSyncBase', notes: 'Notes' };
const AIRSYNC_TASKS: Namespaces = { '': 'AirSync', airsyncbase: 'AirSyncBase', tasks: 'Tasks' };
const AIRSYNC_EMAIL: Namespaces = { '': 'AirSync', email: 'Email' };

// =============================================================================
// Element Helpers
// =============================================================================

function element(name: string, ...children: string[]): string {
  return `<${name}>${children.join('')}</${name}>`;
}

/** Leaf element with escaped content */
function text(name: string, value: string | number): string {
  return `<${name}>${escapeXml(String(value))}</${name}>`;
}

function document(root: string, namespaces: Namespaces, ...children: string[]): string {
  const attrs = Object.entries(namespaces)
    .map(([prefix, uri]) => (prefix ? ` xmlns:${prefix}="${uri}"` : ` xmlns="${uri}"`))
    .join('');
  return `${XML_DECLARATION}<${root}${attrs}>${children.join('')}</${root}>`;
}

function syncDocument(namespaces: Namespaces, ...collectionChildren: string[]): string {
  return document(
    'Sync',
    namespaces,
    element('Collections', element('Collection', ...collectionChildren))
  );
}

function flag(value: boolean): string {
  return value ? '1' : '0';
}

/**
 * ISO-8601 in UTC with a zeroed millisecond field, the form Exchange
 * accepts for every task date element
 */
export function formatEasDate(epochMillis: number): string {
  return new Date(epochMillis).toISOString().replace(/\.\d{3}Z$/, '.000Z');
}

function plainTextBody(body: string): string {
  return element(
    'airsyncbase:Body',
    text('airsyncbase:Type', BodyType.PLAIN_TEXT),
    text('airsyncbase:Data', body)
  );
}

function categoriesElement(prefix: string, categories: readonly string[] | undefined): string {
  if (!categories || categories.length === 0) {
    return '';
  }
  return element(
    `${prefix}:Categories`,
    ...categories.map((category) => text(`${prefix}:Category`, category))
  );
}

// =============================================================================
// Sync
// =============================================================================

export interface SyncWithBodyOptions {
  windowSize?: number;
  bodyType?: number;
  truncationSize?: number;
}

/**
 * First Sync of a collection. Returns a token and no items.
 */
export function buildSyncInitial(collectionId: string): string {
  return syncDocument(AIRSYNC, text('SyncKey', '0'), text('CollectionId', collectionId));
}

/**
 * Handshake that advances a non-zero token while fetching at most one change
 */
export function buildSyncKeyRefresh(syncKey: string, collectionId: string): string {
  return syncDocument(
    AIRSYNC,
    text('SyncKey', syncKey),
    text('CollectionId', collectionId),
    text('GetChanges', '1'),
    text('WindowSize', 1)
  );
}

export function buildSyncWithBody(
  syncKey: string,
  collectionId: string,
  options: SyncWithBodyOptions = {}
): string {
  return syncDocument(
    AIRSYNC_BASE,
    text('SyncKey', syncKey),
    text('CollectionId', collectionId),
    text('DeletesAsMoves', '1'),
    text('GetChanges', '1'),
    text('WindowSize', options.windowSize ?? DEFAULT_WINDOW_SIZE),
    element(
      'Options',
      element(
        'airsyncbase:BodyPreference',
        text('airsyncbase:Type', options.bodyType ?? BodyType.PLAIN_TEXT),
        text('airsyncbase:TruncationSize', options.truncationSize ?? DEFAULT_TRUNCATION_SIZE)
      )
    )
  );
}

/**
 * Delete one item. `deletesAsMoves` selects a recoverable move into
 * Deleted Items (true) or permanent removal (false); nothing else differs.
 */
export function buildSyncDelete(
  syncKey: string,
  collectionId: string,
  serverId: string,
  deletesAsMoves: boolean
): string {
  return syncDocument(
    AIRSYNC,
    text('SyncKey', syncKey),
    text('CollectionId', collectionId),
    text('DeletesAsMoves', flag(deletesAsMoves)),
    text('GetChanges', '0'),
    element('Commands', element('Delete', text('ServerId', serverId)))
  );
}

function buildSyncAdd(
  namespaces: Namespaces,
  syncKey: string,
  collectionId: string,
  clientId: string,
  applicationData: string
): string {
  return syncDocument(
    namespaces,
    text('SyncKey', syncKey),
    text('CollectionId', collectionId),
    text('GetChanges', '0'),
    element(
      'Commands',
      element('Add', text('ClientId', clientId), element('ApplicationData', applicationData))
    )
  );
}

function buildSyncChange(
  namespaces: Namespaces,
  syncKey: string,
  collectionId: string,
  serverId: string,
  applicationData: string
): string {
  return syncDocument(
    namespaces,
    text('SyncKey', syncKey),
    text('CollectionId', collectionId),
    text('GetChanges', '0'),
    element(
      'Commands',
      element('Change', text('ServerId', serverId), element('ApplicationData', applicationData))
    )
  );
}

// =============================================================================
// Notes
// =============================================================================

export interface NoteContent {
  subject: string;
  body: string;
  categories?: readonly string[];
}

function noteApplicationData(note: NoteContent): string {
  return [
    text('notes:Subject', note.subject),
    plainTextBody(note.body),
    text('notes:MessageClass', NOTE_MESSAGE_CLASS),
    categoriesElement('notes', note.categories),
  ].join('');
}

export function buildNoteCreate(
  syncKey: string,
  collectionId: string,
  clientId: string,
  note: NoteContent
): string {
  return buildSyncAdd(AIRSYNC_NOTES, syncKey, collectionId, clientId, noteApplicationData(note));
}

export function buildNoteUpdate(
  syncKey: string,
  collectionId: string,
  serverId: string,
  note: NoteContent
): string {
  return buildSyncChange(AIRSYNC_NOTES, syncKey, collectionId, serverId, noteApplicationData(note));
}

// =============================================================================
// Tasks
// =============================================================================

export interface TaskContent {
  subject: string;
  body: string;
  importance: TaskImportance;
  complete: boolean;
  startDate?: number;
  dueDate?: number;
  reminderTime?: number;
  categories?: readonly string[];
}

/**
 * Protocol 12.x rejects Body and the Utc* dates inside a Change, so
 * `modern` is false for updates against those servers.
 */
function taskApplicationData(task: TaskContent, modern: boolean, completedAt: number | null): string {
  const parts = [text('tasks:Subject', task.subject)];

  if (modern) {
    parts.push(plainTextBody(task.body));
  }
  parts.push(text('tasks:Importance', task.importance), text('tasks:Complete', flag(task.complete)));

  if (task.complete && completedAt !== null && modern) {
    parts.push(text('tasks:DateCompleted', formatEasDate(completedAt)));
  }
  if (task.startDate !== undefined && task.startDate > 0) {
    parts.push(text('tasks:StartDate', formatEasDate(task.startDate)));
    if (modern) {
      parts.push(text('tasks:UtcStartDate', formatEasDate(task.startDate)));
    }
  }
  if (task.dueDate !== undefined && task.dueDate > 0) {
    parts.push(text('tasks:DueDate', formatEasDate(task.dueDate)));
    if (modern) {
      parts.push(text('tasks:UtcDueDate', formatEasDate(task.dueDate)));
    }
  }
  if (task.reminderTime !== undefined && task.reminderTime > 0) {
    parts.push(text('tasks:ReminderSet', '1'), text('tasks:ReminderTime', formatEasDate(task.reminderTime)));
  } else {
    parts.push(text('tasks:ReminderSet', '0'));
  }
  parts.push(categoriesElement('tasks', task.categories));

  return parts.join('');
}

export function buildTaskCreate(
  syncKey: string,
  collectionId: string,
  clientId: string,
  task: TaskContent
): string {
  return buildSyncAdd(
    AIRSYNC_TASKS,
    syncKey,
    collectionId,
    clientId,
    taskApplicationData({ ...task, complete: false }, true, null)
  );
}

export function buildTaskUpdate(
  syncKey: string,
  collectionId: string,
  serverId: string,
  task: TaskContent,
  options: { modern: boolean; completedAt: number }
): string {
  return buildSyncChange(
    AIRSYNC_TASKS,
    syncKey,
    collectionId,
    serverId,
    taskApplicationData(task, options.modern, options.completedAt)
  );
}

// =============================================================================
// Mail
// =============================================================================

export function buildMailReadChange(
  syncKey: string,
  collectionId: string,
  serverId: string,
  read: boolean
): string {
  return buildSyncChange(AIRSYNC_EMAIL, syncKey, collectionId, serverId, text('email:Read', flag(read)));
}

// =============================================================================
// Folder Hierarchy
// =============================================================================

export function buildFolderSync(syncKey: string): string {
  return document('FolderSync', { '': 'FolderHierarchy' }, text('SyncKey', syncKey));
}

export function buildFolderCreate(
  syncKey: string,
  parentId: string,
  displayName: string,
  type: number
): string {
  return document(
    'FolderCreate',
    { '': 'FolderHierarchy' },
    text('SyncKey', syncKey),
    text('ParentId', parentId),
    text('DisplayName', displayName),
    text('Type', type)
  );
}

export function buildFolderDelete(syncKey: string, serverId: string): string {
  return document(
    'FolderDelete',
    { '': 'FolderHierarchy' },
    text('SyncKey', syncKey),
    text('ServerId', serverId)
  );
}

export function buildFolderUpdate(
  syncKey: string,
  serverId: string,
  parentId: string,
  displayName: string
): string {
  return document(
    'FolderUpdate',
    { '': 'FolderHierarchy' },
    text('SyncKey', syncKey),
    text('ServerId', serverId),
    text('ParentId', parentId),
    text('DisplayName', displayName)
  );
}

// =============================================================================
// Move
// =============================================================================

/**
 * One Move element per source item, all targeting `dstFolderId`
 */
export function buildMoveItems(sources: readonly MoveSource[], dstFolderId: string): string {
  return document(
    'MoveItems',
    { '': 'Move' },
    ...sources.map((source) =>
      element(
        'Move',
        text('SrcMsgId', source.serverId),
        text('SrcFldId', source.srcFolderId),
        text('DstFldId', dstFolderId)
      )
    )
  );
}

// =============================================================================
// Search
// =============================================================================

/**
 * Global Address List lookup. A blank query searches for everything.
 */
export function buildSearchGal(query: string, maxResults: number = DEFAULT_GAL_RESULTS): string {
  const effectiveQuery = query.trim() === '' ? '*' : query.trim();
  return document(
    'Search',
    { '': 'Search', gal: 'Gal' },
    element(
      'Store',
      text('Name', 'GAL'),
      text('Query', effectiveQuery),
      element('Options', text('Range', `0-${Math.max(maxResults, 1) - 1}`))
    )
  );
}

export interface MailboxSearchOptions {
  collectionId?: string;
  rangeStart?: number;
  rangeEnd?: number;
}

export function buildSearchMailbox(query: string, options: MailboxSearchOptions = {}): string {
  const rangeStart = options.rangeStart ?? 0;
  const rangeEnd = options.rangeEnd ?? 99;
  const scope = options.collectionId ? text('airsync:CollectionId', options.collectionId) : '';

  return document(
    'Search',
    { '': 'Search', airsync: 'AirSync', airsyncbase: 'AirSyncBase' },
    element(
      'Store',
      text('Name', 'Mailbox'),
      element('Query', element('And', scope, text('FreeText', query))),
      element(
        'Options',
        text('Range', `${rangeStart}-${rangeEnd}`),
        element(
          'airsyncbase:BodyPreference',
          text('airsyncbase:Type', BodyType.PLAIN_TEXT),
          text('airsyncbase:TruncationSize', DEFAULT_TRUNCATION_SIZE)
        )
      )
    )
  );
}

// =============================================================================
// Provisioning
// =============================================================================

export const POLICY_TYPE = 'MS-EAS-Provisioning-WBXML';

export interface DeviceInformation {
  model: string;
  friendlyName: string;
  os: string;
  userAgent: string;
}

/**
 * Phase one: ask for the policy. Protocol 14+ also carries device settings.
 */
export function buildProvisionRequest(device: DeviceInformation | null): string {
  const deviceBlock = device
    ? element(
        'settings:DeviceInformation',
        element(
          'settings:Set',
          text('settings:Model', device.model),
          text('settings:FriendlyName', device.friendlyName),
          text('settings:OS', device.os),
          text('settings:UserAgent', device.userAgent)
        )
      )
    : '';

  return document(
    'Provision',
    { '': 'Provision', settings: 'Settings' },
    deviceBlock,
    element('Policies', element('Policy', text('PolicyType', POLICY_TYPE)))
  );
}

/**
 * Phase two: acknowledge the temporary policy key
 */
export function buildProvisionAck(policyKey: string): string {
  return document(
    'Provision',
    { '': 'Provision' },
    element(
      'Policies',
      element('Policy', text('PolicyType', POLICY_TYPE), text('PolicyKey', policyKey), text('Status', '1'))
    )
  );
}
