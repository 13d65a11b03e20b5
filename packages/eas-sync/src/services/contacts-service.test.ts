/**
 * Tests for the Contacts Service
 */

import { EasContactsAdapter } from '../adapters/eas-contacts-adapter';
import { FolderType } from '../interfaces/types';
import { extractValue } from '../protocol/xml-extractor';
import { SyncStateStore } from '../sync/sync-state';
import { FixedVersion, ScriptedExecutor, addCommand, folderSyncReply, syncReply } from '../testing/fakes';
import { CapabilityResolver } from './capability-strategy';
import { ContactsService } from './contacts-service';
import { FolderService } from './folder-service';

const HIERARCHY = [
  ['2', FolderType.INBOX, 'Inbox'],
  ['9', FolderType.CONTACTS, 'Contacts'],
] as const;

const contactData = (first: string, last: string, email = ''): string =>
  `<contacts:FirstName>${first}</contacts:FirstName><contacts:LastName>${last}</contacts:LastName>` +
  (email ? `<contacts:Email1Address>${email}</contacts:Email1Address>` : '');

function createStack(executor: ScriptedExecutor, version: string) {
  const folders = new FolderService(executor);
  const syncState = new SyncStateStore(executor);
  const service = new ContactsService(new CapabilityResolver(new FixedVersion(version)), {
    native: new EasContactsAdapter({ executor, folders, tokens: syncState }),
    soap: null,
  });
  return { syncState, service };
}

describe('ContactsService', () => {
  let executor: ScriptedExecutor;

  beforeEach(() => {
    executor = new ScriptedExecutor();
  });

  describe('syncContacts', () => {
    it('should download every window of the Contacts folder', async () => {
      const { service, syncState } = createStack(executor, '12.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({
          syncKey: '2',
          moreAvailable: true,
          commands: addCommand('9:1', contactData('Ana', 'Lima', 'ana@example.com')),
        }),
        syncReply({
          syncKey: '3',
          commands:
            addCommand('9:2', contactData('Rui', 'Costa')) +
            addCommand('9:3', '<contacts:CompanyName>Acme</contacts:CompanyName>'),
        })
      );

      const result = await service.syncContacts();

      expect(result.ok && result.data.map((contact) => [contact.serverId, contact.displayName])).toEqual([
        ['9:1', 'Ana Lima'],
        ['9:2', 'Rui Costa'],
      ]);
      expect(executor.commands()).toEqual(['FolderSync', 'Sync', 'Sync', 'Sync']);
      expect(extractValue(executor.bodyOf(1), 'SyncKey')).toBe('0');
      expect(extractValue(executor.bodyOf(2), 'CollectionId')).toBe('9');
      expect(extractValue(executor.bodyOf(2), 'WindowSize')).toBe('500');
      expect(syncState.getToken('9')).toBe('3');
    });

    it('should report a missing Contacts folder', async () => {
      const { service } = createStack(executor, '12.1');
      executor.reply(folderSyncReply([['2', FolderType.INBOX, 'Inbox']]));

      const result = await service.syncContacts();

      expect(result).toMatchObject({
        ok: false,
        error: { code: 'FOLDER_NOT_FOUND', message: 'Contacts folder not found' },
      });
    });

    it('should refuse servers older than ActiveSync 12', async () => {
      const { service } = createStack(executor, '2.5');

      const result = await service.syncContacts();

      expect(result).toMatchObject({
        ok: false,
        error: { code: 'UNSUPPORTED', message: 'syncContacts is not supported by protocol version 2.5' },
      });
      expect(executor.calls).toHaveLength(0);
    });
  });

  describe('syncContactChanges', () => {
    it('should handshake from the zero key before the first window', async () => {
      const { service } = createStack(executor, '12.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2', commands: addCommand('9:1', contactData('Ana', 'Lima')) })
      );

      const result = await service.syncContactChanges('0');

      expect(result.ok).toBe(true);
      const delta = result.ok ? result.data : null;
      expect(delta?.added.map((contact) => contact.displayName)).toEqual(['Ana Lima']);
      expect(delta?.nextSyncKey).toBe('2');
      expect(extractValue(executor.bodyOf(1), 'SyncKey')).toBe('0');
      expect(extractValue(executor.bodyOf(2), 'SyncKey')).toBe('1');
    });

    it('should continue from a stored key without a handshake', async () => {
      const { service, syncState } = createStack(executor, '14.1');
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({
          syncKey: '6',
          commands:
            '<Change><ServerId>9:1</ServerId><ApplicationData>' +
            contactData('Ana', 'Lima') +
            '<contacts:MobilePhoneNumber>+1 555 0199</contacts:MobilePhoneNumber>' +
            '</ApplicationData></Change>' +
            '<Delete><ServerId>9:2</ServerId></Delete>',
        })
      );

      const result = await service.syncContactChanges('5');

      expect(executor.commands()).toEqual(['FolderSync', 'Sync']);
      expect(extractValue(executor.bodyOf(1), 'SyncKey')).toBe('5');
      expect(result.ok).toBe(true);
      const delta = result.ok ? result.data : null;
      expect(delta?.changed.map((contact) => contact.mobilePhone)).toEqual(['+1 555 0199']);
      expect(delta?.deleted).toEqual(['9:2']);
      expect(delta?.nextSyncKey).toBe('6');
      expect(syncState.getToken('9')).toBe('6');
    });
  });
});
