/**
 * @exsync/eas-sync - Types
 *
 * Data model shared by the protocol layer and the entity services.
 */

// =============================================================================
// Folders
// =============================================================================

/** Folder type codes reported by FolderSync */
export const FolderType = {
  USER_GENERIC: 1,
  INBOX: 2,
  DRAFTS: 3,
  DELETED_ITEMS: 4,
  SENT_ITEMS: 5,
  OUTBOX: 6,
  TASKS: 7,
  CALENDAR: 8,
  CONTACTS: 9,
  NOTES: 10,
  JUNK_EMAIL: 11,
  USER_CREATED: 12,
} as const;

export type FolderTypeName = keyof typeof FolderType;

/**
 * Well-known folders the server creates and will not let clients rename or delete
 */
export function isSystemFolder(type: number): boolean {
  return type >= FolderType.INBOX && type <= FolderType.JUNK_EMAIL;
}

/** Server-side collection */
export interface Folder {
  serverId: string;
  displayName: string;
  /** "0" for root folders */
  parentId: string;
  type: number;
}

export interface FolderSyncResult {
  status: number;
  syncKey: string | null;
  added: Folder[];
  updated: Folder[];
  deleted: string[];
}

// =============================================================================
// Sync
// =============================================================================

/** The zero token: a collection with no sync history */
export const ZERO_SYNC_KEY = '0';

/** Add or Change entry of a Sync response, before entity parsing */
export interface RawSyncItem {
  serverId: string;
  /** Inner XML of ApplicationData, empty when the server sent none */
  applicationData: string;
}

/** Parsed Sync response for one collection */
export interface SyncResponse {
  status: number;
  /** Absent on most failure statuses */
  syncKey: string | null;
  moreAvailable: boolean;
  added: RawSyncItem[];
  changed: RawSyncItem[];
  deleted: string[];
}

/**
 * Changes to apply for one collection. Callers remove `deleted` first,
 * then upsert `added` and `changed`.
 */
export interface SyncDelta<T> {
  collectionId: string;
  added: T[];
  changed: T[];
  deleted: string[];
  moreAvailable: boolean;
  /** Token to checkpoint once the delta has been applied */
  nextSyncKey: string;
}

/** Per-item status from the Responses block of a Sync reply */
export interface SyncItemResponse {
  kind: 'Add' | 'Change' | 'Delete' | 'Fetch';
  serverId: string | null;
  clientId: string | null;
  status: number | null;
}

// =============================================================================
// Entities
// =============================================================================

export interface Note {
  serverId: string;
  subject: string;
  body: string;
  messageClass: string;
  categories: string[];
  /** Milliseconds since epoch, 0 when unknown */
  lastModified: number;
  /** Item came from the Deleted Items collection */
  isDeleted: boolean;
}

export type TaskImportance = 0 | 1 | 2;

export interface Task {
  serverId: string;
  subject: string;
  body: string;
  /** Milliseconds since epoch, 0 when unset */
  startDate: number;
  dueDate: number;
  complete: boolean;
  dateCompleted: number;
  importance: TaskImportance;
  reminderSet: boolean;
  reminderTime: number;
  categories: string[];
  isDeleted: boolean;
}

/**
 * Fields accepted when creating or updating a task. Absent dates are
 * omitted from the request rather than sent empty.
 */
export interface TaskInput {
  subject: string;
  body?: string;
  startDate?: number;
  dueDate?: number;
  importance?: TaskImportance;
  complete?: boolean;
  reminderTime?: number;
  categories?: string[];
}

export interface MailItem {
  serverId: string;
  subject: string;
  from: string;
  to: string;
  cc: string;
  dateReceived: string;
  read: boolean;
  flagged: boolean;
  importance: number;
  body: string;
  messageClass: string;
}

/** Read/flag change reported for an existing message */
export interface MailChange {
  serverId: string;
  read: boolean | null;
  flagged: boolean | null;
}

/** Mail changes arrive as flag updates rather than full messages */
export interface MailSyncDelta extends Omit<SyncDelta<MailItem>, 'changed'> {
  changed: MailChange[];
}

/** Personal contact from the Contacts folder */
export interface Contact {
  serverId: string;
  /** FileAs, else the name parts, else the e-mail address */
  displayName: string;
  firstName: string;
  middleName: string;
  lastName: string;
  email: string;
  email2: string;
  email3: string;
  company: string;
  department: string;
  jobTitle: string;
  officeLocation: string;
  businessPhone: string;
  homePhone: string;
  mobilePhone: string;
  webPage: string;
  nickName: string;
  categories: string[];
}

export interface GalContact {
  displayName: string;
  email: string;
  firstName: string;
  lastName: string;
  company: string;
  department: string;
  jobTitle: string;
  phone: string;
  mobilePhone: string;
  alias: string;
}

export interface MailboxSearchHit {
  serverId: string;
  collectionId: string;
  subject: string;
  from: string;
  dateReceived: string;
  preview: string;
}

// =============================================================================
// Moves
// =============================================================================

/** One source item of a MoveItems batch */
export interface MoveSource {
  serverId: string;
  srcFolderId: string;
}

export interface MoveItemResponse {
  srcMsgId: string;
  dstMsgId: string | null;
  status: number;
}

// =============================================================================
// EWS
// =============================================================================

export type EwsDeleteType = 'MoveToDeletedItems' | 'HardDelete';

export type EwsGeneration = 'legacy' | 'modern';

export interface EwsItemId {
  id: string;
  changeKey: string | null;
}
