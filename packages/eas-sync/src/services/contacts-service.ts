/**
 * @exsync/eas-sync - Contacts Service
 *
 * Contacts folder sync over ActiveSync 12.0 and later. There is no EWS
 * path.
 */

import { NativeMinimum } from './capability-strategy';

import type { ContactsBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { Contact, SyncDelta } from '../interfaces/types';
import type { CapabilityResolver, PathImplementations } from './capability-strategy';

export class ContactsService implements ContactsBackend {
  constructor(
    private readonly resolver: CapabilityResolver,
    private readonly backends: PathImplementations<ContactsBackend>
  ) {}

  async syncContacts(): Promise<EasResult<Contact[]>> {
    const backend = await this.backend('syncContacts');
    return backend.ok ? backend.data.syncContacts() : backend;
  }

  async syncContactChanges(syncKey: string): Promise<EasResult<SyncDelta<Contact>>> {
    const backend = await this.backend('syncContactChanges');
    return backend.ok ? backend.data.syncContactChanges(syncKey) : backend;
  }

  private backend(operation: string): Promise<EasResult<ContactsBackend>> {
    return this.resolver.select(operation, this.backends, NativeMinimum.CORE);
  }
}
