/**
 * @exsync/eas-sync - Mail Service
 *
 * Mail sync, soft delete and read state run natively on every supported
 * version. Permanent deletion needs protocol 14 or the EWS path.
 */

import { NativeMinimum } from './capability-strategy';

import type { MailBackend, MailDeleteBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { MailSyncDelta } from '../interfaces/types';
import type { CapabilityResolver } from './capability-strategy';

export class MailService implements MailBackend {
  constructor(
    private readonly resolver: CapabilityResolver,
    private readonly native: MailBackend,
    private readonly soap: MailDeleteBackend | null
  ) {}

  async syncFolder(collectionId: string, syncKey: string): Promise<EasResult<MailSyncDelta>> {
    const backend = await this.core('syncFolder');
    return backend.ok ? backend.data.syncFolder(collectionId, syncKey) : backend;
  }

  async deleteEmail(collectionId: string, serverId: string): Promise<EasResult<boolean>> {
    const backend = await this.core('deleteEmail');
    return backend.ok ? backend.data.deleteEmail(collectionId, serverId) : backend;
  }

  async deleteEmailPermanently(serverId: string): Promise<EasResult<boolean>> {
    const backend = await this.resolver.select<MailDeleteBackend>(
      'deleteEmailPermanently',
      { native: this.native, soap: this.soap },
      NativeMinimum.ENTITIES
    );
    return backend.ok ? backend.data.deleteEmailPermanently(serverId) : backend;
  }

  async markRead(collectionId: string, serverId: string, read: boolean): Promise<EasResult<boolean>> {
    const backend = await this.core('markRead');
    return backend.ok ? backend.data.markRead(collectionId, serverId, read) : backend;
  }

  private core(operation: string): Promise<EasResult<MailBackend>> {
    return this.resolver.select(operation, { native: this.native, soap: null }, NativeMinimum.CORE);
  }
}
