/**
 * @exsync/eas-sync - Native Contacts Adapter
 *
 * Personal contacts from the Contacts folder. Exchange 2007 and later
 * sync them natively; directory lookups go through SearchService.
 */

import { FolderType, ZERO_SYNC_KEY } from '../interfaces/types';
import { parseContact } from '../protocol/item-parsers';
import { EasCollectionCommands } from './eas-commands';

import type { ContactsBackend } from '../interfaces/backends';
import type { SyncTokens } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { Contact, SyncDelta } from '../interfaces/types';
import type { SyncWithBodyOptions } from '../protocol/request-builder';
import type { NativeAdapterDeps } from './eas-commands';

/** Items per Sync round */
export const CONTACT_WINDOW_SIZE = 500;

const CONTACT_SYNC_OPTIONS: SyncWithBodyOptions = { windowSize: CONTACT_WINDOW_SIZE };

const contactKey = (contact: Contact): string => contact.serverId;

export class EasContactsAdapter implements ContactsBackend {
  private readonly commands: EasCollectionCommands;
  private readonly tokens: SyncTokens;

  constructor(deps: NativeAdapterDeps) {
    this.commands = new EasCollectionCommands(deps, 'EasContacts');
    this.tokens = deps.tokens;
  }

  async syncContacts(): Promise<EasResult<Contact[]>> {
    const hierarchy = await this.commands.refreshHierarchy();
    if (!hierarchy.ok) {
      return hierarchy;
    }
    const contactsId = await this.commands.resolveCollection(FolderType.CONTACTS, 'Contacts');
    if (!contactsId.ok) {
      return contactsId;
    }

    const contacts = await this.commands.downloadAll(
      contactsId.data,
      parseContact,
      contactKey,
      CONTACT_SYNC_OPTIONS
    );
    if (contacts.ok) {
      this.commands.logger.info('Contacts synced', { contacts: contacts.data.length });
    }
    return contacts;
  }

  async syncContactChanges(syncKey: string): Promise<EasResult<SyncDelta<Contact>>> {
    const contactsId = await this.commands.resolveCollection(FolderType.CONTACTS, 'Contacts');
    if (!contactsId.ok) {
      return contactsId;
    }

    let token = syncKey;
    if (token === ZERO_SYNC_KEY) {
      const handshake = await this.tokens.refresh(contactsId.data, ZERO_SYNC_KEY);
      if (!handshake.ok) {
        return handshake;
      }
      token = handshake.data;
    }

    return this.tokens.sync(contactsId.data, token, parseContact, CONTACT_SYNC_OPTIONS);
  }
}
