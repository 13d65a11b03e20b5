/**
 * @exsync/eas-sync - EWS Notes Adapter
 *
 * Notes for Exchange 2007, whose ActiveSync has no Notes class. Notes are
 * IPM.StickyNote messages in the distinguished "notes" folder.
 */

import { ok } from '../interfaces/result';
import { parseEwsNotes } from '../protocol/item-parsers';
import { buildCreateNoteItem, buildUpdateNoteItem } from '../protocol/soap-builder';
import { DistinguishedFolder, EwsItemCommands } from './ews-commands';

import type { NotesBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { Note } from '../interfaces/types';
import type { SoapAdapterDeps } from './ews-commands';

export class EwsNotesAdapter implements NotesBackend {
  private readonly commands: EwsItemCommands;

  constructor(deps: SoapAdapterDeps) {
    this.commands = new EwsItemCommands(deps, 'EwsNotes');
  }

  /** Categories have no EWS counterpart on this path and are dropped */
  async createNote(subject: string, body: string): Promise<EasResult<string>> {
    return this.commands.create('Create note', buildCreateNoteItem(subject, body));
  }

  async updateNote(serverId: string, subject: string, body: string): Promise<EasResult<boolean>> {
    return this.commands.update('Update note', DistinguishedFolder.NOTES, serverId, (itemId) =>
      buildUpdateNoteItem(itemId, subject, body)
    );
  }

  async deleteNote(serverId: string): Promise<EasResult<boolean>> {
    return this.commands.delete('Delete note', DistinguishedFolder.NOTES, serverId, 'MoveToDeletedItems');
  }

  async deleteNotePermanently(serverId: string): Promise<EasResult<boolean>> {
    return this.commands.delete(
      'Permanently delete note',
      DistinguishedFolder.DELETED_ITEMS,
      serverId,
      'HardDelete'
    );
  }

  async restoreNote(serverId: string): Promise<EasResult<string>> {
    return this.commands.move(
      'Restore note',
      DistinguishedFolder.DELETED_ITEMS,
      serverId,
      DistinguishedFolder.NOTES
    );
  }

  async syncNotes(): Promise<EasResult<Note[]>> {
    const notes = await this.commands.listItems(DistinguishedFolder.NOTES, parseEwsNotes);
    if (!notes.ok) {
      return notes;
    }
    const deleted = await this.commands.listItems(DistinguishedFolder.DELETED_ITEMS, parseEwsNotes);
    if (!deleted.ok) {
      return deleted;
    }

    this.commands.logger.info('Notes synced', {
      notes: notes.data.length,
      deleted: deleted.data.length,
    });
    return ok([...notes.data, ...deleted.data.map((note) => ({ ...note, isDeleted: true }))]);
  }
}
