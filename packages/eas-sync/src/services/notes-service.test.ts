/**
 * Tests for the Notes Service
 */

import { EasNotesAdapter } from '../adapters/eas-notes-adapter';
import { EwsNotesAdapter } from '../adapters/ews-notes-adapter';
import { ok } from '../interfaces/result';
import { FolderType } from '../interfaces/types';
import { extractValue } from '../protocol/xml-extractor';
import { SyncStateStore } from '../sync/sync-state';
import {
  FixedVersion,
  ScriptedExecutor,
  addCommand,
  ewsId,
  ewsReply,
  findItemReply,
  folderSyncReply,
  noteData,
  syncReply,
} from '../testing/fakes';
import { CapabilityResolver } from './capability-strategy';
import { FolderService } from './folder-service';
import { NotesService } from './notes-service';

import type { FolderResolver, SyncTokens } from '../interfaces/capabilities';

const HIERARCHY = [
  ['2', FolderType.INBOX, 'Inbox'],
  ['4', FolderType.DELETED_ITEMS, 'Deleted Items'],
  ['10', FolderType.NOTES, 'Notes'],
] as const;

const addResponse = (serverId: string, status = 1): string =>
  `<Add><ClientId>unrelated</ClientId><ServerId>${serverId}</ServerId><Status>${status}</Status></Add>`;

/**
 * Service over the real folder and token components, talking to `executor`
 */
function createStack(executor: ScriptedExecutor, version: string) {
  const folders = new FolderService(executor);
  const syncState = new SyncStateStore(executor);
  const service = new NotesService(new CapabilityResolver(new FixedVersion(version)), {
    native: new EasNotesAdapter({ executor, folders, tokens: syncState }),
    soap: new EwsNotesAdapter({ soap: executor }),
  });
  return { folders, syncState, service };
}

describe('NotesService', () => {
  let executor: ScriptedExecutor;

  beforeEach(() => {
    executor = new ScriptedExecutor();
  });

  describe('native path', () => {
    it('should create a note against the refreshed key', async () => {
      const folders: FolderResolver = {
        resolveFolderId: jest.fn().mockResolvedValue(ok('notes123')),
        refreshHierarchy: jest.fn().mockResolvedValue(ok(true)),
      };
      const tokens: SyncTokens = {
        getToken: jest.fn().mockReturnValue('0'),
        refresh: jest.fn().mockResolvedValue(ok('key456')),
        commit: jest.fn(),
        sync: jest.fn(),
        withSyncKeyRetry: jest.fn(),
      };
      const service = new NotesService(new CapabilityResolver(new FixedVersion('14.1')), {
        native: new EasNotesAdapter({ executor, folders, tokens }),
        soap: null,
      });
      executor.reply(syncReply({ syncKey: 'key457', responses: addResponse('notes123:1') }));

      const result = await service.createNote('Test Note', 'Body');

      expect(result).toEqual({ ok: true, data: 'notes123:1' });
      expect(executor.commands()).toEqual(['Sync']);
      expect(executor.bodyOf(0)).toContain('<SyncKey>key456</SyncKey>');
      expect(executor.bodyOf(0)).toContain('<CollectionId>notes123</CollectionId>');
      expect(extractValue(executor.bodyOf(0), 'ClientId')).toMatch(/^[0-9a-f]{32}$/);
      expect(tokens.refresh).toHaveBeenCalledWith('notes123', '0');
      expect(tokens.commit).toHaveBeenCalledWith('notes123', 'key457');
    });

    it('should report a missing Notes folder without any command', async () => {
      const folders: FolderResolver = {
        resolveFolderId: jest.fn().mockResolvedValue(ok(null)),
        refreshHierarchy: jest.fn().mockResolvedValue(ok(true)),
      };
      const tokens = new SyncStateStore(executor);
      const service = new NotesService(new CapabilityResolver(new FixedVersion('14.1')), {
        native: new EasNotesAdapter({ executor, folders, tokens }),
        soap: null,
      });

      const result = await service.createNote('Test Note', 'Body');

      expect(result).toMatchObject({
        ok: false,
        error: { code: 'FOLDER_NOT_FOUND', message: 'Notes folder not found' },
      });
      expect(executor.calls).toHaveLength(0);
    });

    it('should hard delete from Deleted Items and soft delete from Notes', async () => {
      const { service } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2' }),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2' })
      );

      expect(await service.deleteNotePermanently('4:7')).toEqual({ ok: true, data: true });
      expect(await service.deleteNote('4:7')).toEqual({ ok: true, data: true });

      expect(executor.commands()).toEqual(['FolderSync', 'Sync', 'Sync', 'Sync', 'Sync']);
      const hard = executor.bodyOf(2);
      expect(extractValue(hard, 'CollectionId')).toBe('4');
      expect(hard).toContain('<DeletesAsMoves>0</DeletesAsMoves>');
      const soft = executor.bodyOf(4);
      expect(extractValue(soft, 'CollectionId')).toBe('10');
      expect(soft).toContain('<DeletesAsMoves>1</DeletesAsMoves>');
    });

    it('should treat an already deleted note as deleted', async () => {
      const { service } = createStack(executor, '14.1');
      executor.reply(folderSyncReply(HIERARCHY), syncReply({ syncKey: '1' }), syncReply({ status: 8 }));

      expect(await service.deleteNote('10:3')).toEqual({ ok: true, data: true });
    });

    it('should sync empty collections and advance both tokens', async () => {
      const { service, syncState } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2' }),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2' })
      );

      const result = await service.syncNotes();

      expect(result).toEqual({ ok: true, data: [] });
      expect(syncState.getToken('10')).toBe('2');
      expect(syncState.getToken('4')).toBe('2');
    });

    it('should merge notes with deleted notes and skip other deleted items', async () => {
      const { service } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({
          syncKey: '2',
          moreAvailable: true,
          commands: addCommand('10:1', noteData('Groceries', 'Milk')),
        }),
        syncReply({ syncKey: '3', commands: addCommand('10:2', noteData('Ideas', 'Garden')) }),
        syncReply({ syncKey: '1' }),
        syncReply({
          syncKey: '2',
          commands:
            addCommand('4:1', noteData('Old note', 'Gone')) +
            addCommand('4:2', noteData('Invoice', 'Paid', 'IPM.Note')),
        })
      );

      const result = await service.syncNotes();

      expect(result.ok).toBe(true);
      const notes = result.ok ? result.data : [];
      expect(notes.map((note) => [note.serverId, note.subject, note.isDeleted])).toEqual([
        ['10:1', 'Groceries', false],
        ['10:2', 'Ideas', false],
        ['4:1', 'Old note', true],
      ]);
    });

    it('should restart a download from zero after an invalid key', async () => {
      const { service } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: null, status: 3 }),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2', commands: addCommand('10:1', noteData('Kept', 'x')) }),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2' })
      );

      const result = await service.syncNotes();

      expect(result.ok && result.data.map((note) => note.subject)).toEqual(['Kept']);
      expect(executor.pending).toBe(0);
    });

    it('should return the new id when restoring', async () => {
      const { service } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        '<MoveItems><Response><SrcMsgId>4:7</SrcMsgId><Status>3</Status>' +
          '<DstMsgId>10:9</DstMsgId></Response></MoveItems>'
      );

      const result = await service.restoreNote('4:7');

      expect(result).toEqual({ ok: true, data: '10:9' });
      const move = executor.bodyOf(1);
      expect(extractValue(move, 'SrcFldId')).toBe('4');
      expect(extractValue(move, 'DstFldId')).toBe('10');
    });

    it('should report a failed restore', async () => {
      const { service } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        '<MoveItems><Response><SrcMsgId>4:7</SrcMsgId><Status>1</Status></Response></MoveItems>'
      );

      const result = await service.restoreNote('4:7');

      expect(result).toMatchObject({ ok: false, error: { code: 'STATUS_ERROR', status: 1 } });
    });

    it('should report a rejected update', async () => {
      const { service } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({
          syncKey: '2',
          responses: '<Change><ServerId>10:1</ServerId><Status>6</Status></Change>',
        })
      );

      const result = await service.updateNote('10:1', 'S', 'B');

      expect(result).toMatchObject({ ok: false, error: { code: 'STATUS_ERROR', status: 6 } });
    });

    it('should reset the collection when an item command hits an invalid key', async () => {
      const { service, syncState } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: null, status: 3 })
      );

      const result = await service.updateNote('10:1', 'S', 'B');

      expect(result).toMatchObject({ ok: false, error: { code: 'INVALID_SYNC_KEY' } });
      expect(syncState.getState('10')).toEqual({ kind: 'UNSYNCED' });
    });
  });

  describe('EWS path', () => {
    it('should create notes with CreateItem below protocol 14', async () => {
      const { service } = createStack(executor, '12.1');
      const created = `<m:Items><t:Message><t:ItemId Id="${ewsId('N1')}" ChangeKey="CK"/></t:Message></m:Items>`;
      executor.reply(ewsReply('CreateItem', created));

      const result = await service.createNote('Test Note', 'Body');

      expect(result).toEqual({ ok: true, data: ewsId('N1') });
      expect(executor.commands()).toEqual(['CreateItem']);
      expect(executor.bodyOf(0)).toContain('<t:ItemClass>IPM.StickyNote</t:ItemClass>');
    });

    it('should hard delete an ActiveSync id by index in deleteditems', async () => {
      const { service } = createStack(executor, '12.1');
      executor.reply(findItemReply(['d1', 'd2']), ewsReply('DeleteItem'));

      expect(await service.deleteNotePermanently('4:2')).toEqual({ ok: true, data: true });
      expect(executor.commands()).toEqual(['FindItem', 'DeleteItem']);
      expect(executor.bodyOf(0)).toContain('<t:DistinguishedFolderId Id="deleteditems"/>');
      expect(executor.bodyOf(1)).toContain('DeleteType="HardDelete"');
      expect(executor.bodyOf(1)).toContain('<t:ItemId Id="d2"/>');
    });

    it('should move soft-deleted notes to Deleted Items', async () => {
      const { service } = createStack(executor, '12.1');
      executor.reply(ewsReply('DeleteItem', '', 'ErrorItemNotFound'));

      expect(await service.deleteNote(ewsId('N1'))).toEqual({ ok: true, data: true });
      expect(executor.bodyOf(0)).toContain('DeleteType="MoveToDeletedItems"');
    });

    it('should update with the current change key', async () => {
      const { service } = createStack(executor, '12.1');
      const id = ewsId('N1');
      executor.reply(
        ewsReply('GetItem', `<m:Items><t:Message><t:ItemId Id="${id}" ChangeKey="CK2"/></t:Message></m:Items>`),
        ewsReply('UpdateItem')
      );

      expect(await service.updateNote(id, 'New', 'Text')).toEqual({ ok: true, data: true });
      expect(executor.bodyOf(1)).toContain(`<t:ItemId Id="${id}" ChangeKey="CK2"/>`);
    });

    it('should list notes and deleted notes', async () => {
      const { service } = createStack(executor, '12.1');
      const message = (id: string, subject: string): string =>
        `<t:Message><t:ItemId Id="${id}"/><t:ItemClass>IPM.StickyNote</t:ItemClass>` +
        `<t:Subject>${subject}</t:Subject></t:Message>`;
      executor.reply(
        findItemReply(['n1']),
        ewsReply('GetItem', `<m:Items>${message('n1', 'Live')}</m:Items>`),
        findItemReply(['d1']),
        ewsReply('GetItem', `<m:Items>${message('d1', 'Binned')}</m:Items>`)
      );

      const result = await service.syncNotes();

      expect(result.ok && result.data.map((note) => [note.serverId, note.isDeleted])).toEqual([
        ['n1', false],
        ['d1', true],
      ]);
    });

    it('should skip GetItem for an empty folder', async () => {
      const { service } = createStack(executor, '12.1');
      executor.reply(findItemReply([]), findItemReply([]));

      expect(await service.syncNotes()).toEqual({ ok: true, data: [] });
      expect(executor.commands()).toEqual(['FindItem', 'FindItem']);
    });
  });
});
