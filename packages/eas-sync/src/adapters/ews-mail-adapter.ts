/**
 * @exsync/eas-sync - EWS Mail Adapter
 *
 * Protocol 12 removes mail from Deleted Items only as a move; permanent
 * deletion goes through EWS HardDelete.
 */

import { DistinguishedFolder, EwsItemCommands } from './ews-commands';

import type { MailDeleteBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { SoapAdapterDeps } from './ews-commands';

export class EwsMailAdapter implements MailDeleteBackend {
  private readonly commands: EwsItemCommands;

  constructor(deps: SoapAdapterDeps) {
    this.commands = new EwsItemCommands(deps, 'EwsMail');
  }

  async deleteEmailPermanently(serverId: string): Promise<EasResult<boolean>> {
    return this.commands.delete(
      'Permanently delete email',
      DistinguishedFolder.DELETED_ITEMS,
      serverId,
      'HardDelete'
    );
  }
}
