/**
 * @exsync/eas-sync - Entity Backends
 *
 * Contracts the native ActiveSync adapters and the EWS adapters both
 * implement. The entity services pick one per call through the
 * CapabilityResolver, so callers see the same inputs, outputs and error
 * shape whichever path runs.
 */

import type { EasResult } from './result';
import type { Contact, MailSyncDelta, Note, SyncDelta, Task, TaskInput } from './types';

// =============================================================================
// Notes
// =============================================================================

export interface NotesBackend {
  /** Server id of the new note */
  createNote(subject: string, body: string, categories?: readonly string[]): Promise<EasResult<string>>;

  updateNote(serverId: string, subject: string, body: string): Promise<EasResult<boolean>>;

  /** Recoverable: the note moves to Deleted Items */
  deleteNote(serverId: string): Promise<EasResult<boolean>>;

  /** Permanent removal of a note already in Deleted Items */
  deleteNotePermanently(serverId: string): Promise<EasResult<boolean>>;

  /**
   * Move a deleted note back to Notes. The returned id replaces
   * `serverId`; the server assigns a new identity on move.
   */
  restoreNote(serverId: string): Promise<EasResult<string>>;

  /** Notes plus deleted notes, the latter flagged `isDeleted` */
  syncNotes(): Promise<EasResult<Note[]>>;
}

// =============================================================================
// Tasks
// =============================================================================

export interface TasksBackend {
  createTask(task: TaskInput): Promise<EasResult<string>>;
  updateTask(serverId: string, task: TaskInput): Promise<EasResult<boolean>>;
  deleteTask(serverId: string): Promise<EasResult<boolean>>;
  deleteTaskPermanently(serverId: string): Promise<EasResult<boolean>>;
  restoreTask(serverId: string): Promise<EasResult<string>>;
  syncTasks(): Promise<EasResult<Task[]>>;
}

// =============================================================================
// Mail
// =============================================================================

/** Mail operations with an EWS equivalent below protocol 14 */
export interface MailDeleteBackend {
  deleteEmailPermanently(serverId: string): Promise<EasResult<boolean>>;
}

export interface MailBackend extends MailDeleteBackend {
  /** One window of changes after `syncKey`; the zero key starts with a handshake */
  syncFolder(collectionId: string, syncKey: string): Promise<EasResult<MailSyncDelta>>;
  deleteEmail(collectionId: string, serverId: string): Promise<EasResult<boolean>>;
  markRead(collectionId: string, serverId: string, read: boolean): Promise<EasResult<boolean>>;
}

// =============================================================================
// Contacts
// =============================================================================

export interface ContactsBackend {
  /** Every contact in the Contacts folder, downloaded from the zero key */
  syncContacts(): Promise<EasResult<Contact[]>>;

  /** One window of changes after `syncKey`; the zero key starts with a handshake */
  syncContactChanges(syncKey: string): Promise<EasResult<SyncDelta<Contact>>>;
}
