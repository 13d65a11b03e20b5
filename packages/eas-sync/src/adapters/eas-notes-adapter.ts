/**
 * @exsync/eas-sync - Native Notes Adapter
 *
 * Notes over ActiveSync 14+, where the Notes class syncs natively.
 */

import { ok } from '../interfaces/result';
import { FolderType } from '../interfaces/types';
import { isNoteMessageClass, parseNote } from '../protocol/item-parsers';
import { buildNoteCreate, buildNoteUpdate, buildSyncDelete } from '../protocol/request-builder';
import { EasCollectionCommands, generateClientId } from './eas-commands';

import type { NotesBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { Note, RawSyncItem } from '../interfaces/types';
import type { NativeAdapterDeps } from './eas-commands';

const noteKey = (note: Note): string => note.serverId;

/** Deleted Items holds all item classes; keep the notes, flagged deleted */
function parseDeletedNote(item: RawSyncItem): Note | null {
  const note = parseNote(item);
  if (note === null || !isNoteMessageClass(note.messageClass)) {
    return null;
  }
  return { ...note, isDeleted: true };
}

export class EasNotesAdapter implements NotesBackend {
  private readonly commands: EasCollectionCommands;

  constructor(deps: NativeAdapterDeps) {
    this.commands = new EasCollectionCommands(deps, 'EasNotes');
  }

  async createNote(
    subject: string,
    body: string,
    categories?: readonly string[]
  ): Promise<EasResult<string>> {
    const collectionId = await this.commands.resolveCollection(FolderType.NOTES, 'Notes');
    if (!collectionId.ok) {
      return collectionId;
    }
    const syncKey = await this.commands.freshToken(collectionId.data);
    if (!syncKey.ok) {
      return syncKey;
    }

    const clientId = generateClientId();
    const request = buildNoteCreate(syncKey.data, collectionId.data, clientId, {
      subject,
      body,
      ...(categories ? { categories } : {}),
    });
    return this.commands.add('Create note', collectionId.data, clientId, request);
  }

  async updateNote(serverId: string, subject: string, body: string): Promise<EasResult<boolean>> {
    const collectionId = await this.commands.resolveCollection(FolderType.NOTES, 'Notes');
    if (!collectionId.ok) {
      return collectionId;
    }
    const syncKey = await this.commands.freshToken(collectionId.data);
    if (!syncKey.ok) {
      return syncKey;
    }

    const request = buildNoteUpdate(syncKey.data, collectionId.data, serverId, { subject, body });
    return this.commands.change('Update note', collectionId.data, request);
  }

  async deleteNote(serverId: string): Promise<EasResult<boolean>> {
    return this.deleteFrom(FolderType.NOTES, 'Notes', serverId, true);
  }

  async deleteNotePermanently(serverId: string): Promise<EasResult<boolean>> {
    return this.deleteFrom(FolderType.DELETED_ITEMS, 'Deleted Items', serverId, false);
  }

  async restoreNote(serverId: string): Promise<EasResult<string>> {
    const deletedId = await this.commands.resolveCollection(FolderType.DELETED_ITEMS, 'Deleted Items');
    if (!deletedId.ok) {
      return deletedId;
    }
    const notesId = await this.commands.resolveCollection(FolderType.NOTES, 'Notes');
    if (!notesId.ok) {
      return notesId;
    }
    return this.commands.move('Restore note', serverId, deletedId.data, notesId.data);
  }

  async syncNotes(): Promise<EasResult<Note[]>> {
    const hierarchy = await this.commands.refreshHierarchy();
    if (!hierarchy.ok) {
      return hierarchy;
    }
    const notesId = await this.commands.resolveCollection(FolderType.NOTES, 'Notes');
    if (!notesId.ok) {
      return notesId;
    }
    const notes = await this.commands.downloadAll(notesId.data, parseNote, noteKey);
    if (!notes.ok) {
      return notes;
    }

    const deletedId = await this.commands.resolveCollection(FolderType.DELETED_ITEMS, 'Deleted Items');
    if (!deletedId.ok) {
      return deletedId;
    }
    const deleted = await this.commands.downloadAll(deletedId.data, parseDeletedNote, noteKey);
    if (!deleted.ok) {
      return deleted;
    }

    this.commands.logger.info('Notes synced', {
      notes: notes.data.length,
      deleted: deleted.data.length,
    });
    return ok([...notes.data, ...deleted.data]);
  }

  /**
   * Soft delete targets Notes with DeletesAsMoves 1; hard delete targets
   * Deleted Items with DeletesAsMoves 0
   */
  private async deleteFrom(
    folderType: number,
    label: string,
    serverId: string,
    deletesAsMoves: boolean
  ): Promise<EasResult<boolean>> {
    const collectionId = await this.commands.resolveCollection(folderType, label);
    if (!collectionId.ok) {
      return collectionId;
    }
    const syncKey = await this.commands.freshToken(collectionId.data);
    if (!syncKey.ok) {
      return syncKey;
    }

    const request = buildSyncDelete(syncKey.data, collectionId.data, serverId, deletesAsMoves);
    const operation = deletesAsMoves ? 'Delete note' : 'Permanently delete note';
    return this.commands.delete(operation, collectionId.data, request);
  }
}
