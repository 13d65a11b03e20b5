/**
 * @exsync/eas-sync - Client
 *
 * Wires one account's connection: context, NTLM negotiator, transport,
 * version detection, sync state and the entity services. One client per
 * account; nothing is shared between clients.
 *
 * @example
 * ```typescript
 * const client = new EasClient({
 *   serverUrl: 'https://mail.example.com',
 *   username: 'jdoe',
 *   password: 'test-secret',
 *   domain: 'EXAMPLE',
 *   deviceId: 'device0001',
 * });
 *
 * const created = await client.notes.createNote('Shopping', 'Milk, eggs');
 * if (!created.ok) {
 *   console.error(created.error.message);
 * }
 * client.disconnect();
 * ```
 */

import { getLogger } from '@exsync/logger';

import { EasContactsAdapter } from '../adapters/eas-contacts-adapter';
import { EasMailAdapter } from '../adapters/eas-mail-adapter';
import { EasNotesAdapter } from '../adapters/eas-notes-adapter';
import { EasTasksAdapter } from '../adapters/eas-tasks-adapter';
import { EwsMailAdapter } from '../adapters/ews-mail-adapter';
import { EwsNotesAdapter } from '../adapters/ews-notes-adapter';
import { EwsTasksAdapter } from '../adapters/ews-tasks-adapter';
import { NtlmNegotiator } from '../auth/ntlm';
import { CapabilityResolver } from '../services/capability-strategy';
import { ContactsService } from '../services/contacts-service';
import { FolderService } from '../services/folder-service';
import { MailService } from '../services/mail-service';
import { MoveService } from '../services/move-service';
import { NotesService } from '../services/notes-service';
import { ProvisioningService } from '../services/provisioning-service';
import { SearchService } from '../services/search-service';
import { TasksService } from '../services/tasks-service';
import { SyncStateStore } from '../sync/sync-state';
import { ConnectionContext } from '../transport/connection-context';
import { EasTransport } from '../transport/eas-transport';
import { VersionDetector } from '../transport/version-detector';

import type { ILogger } from '@exsync/logger';
import type { EasResult } from '../interfaces/result';
import type { CapabilityStrategy } from '../services/capability-strategy';
import type { ConnectionSettings } from '../transport/connection-context';

export class EasClient {
  readonly context: ConnectionContext;
  readonly versions: VersionDetector;
  readonly syncState: SyncStateStore;
  readonly folders: FolderService;
  readonly notes: NotesService;
  readonly tasks: TasksService;
  readonly mail: MailService;
  readonly contacts: ContactsService;
  readonly move: MoveService;
  readonly search: SearchService;
  readonly provisioning: ProvisioningService;

  private readonly negotiator: NtlmNegotiator;
  private readonly resolver: CapabilityResolver;
  private readonly logger: ILogger;

  constructor(settings: ConnectionSettings, logger?: ILogger) {
    this.context = new ConnectionContext(settings);
    // The logger hashes `account` before output
    this.logger =
      logger ?? getLogger().child({ component: 'EasClient', account: this.context.qualifiedUser });

    this.negotiator = new NtlmNegotiator(
      {
        username: this.context.username,
        password: this.context.password,
        domain: this.context.domain,
        workstation: this.context.workstation,
      },
      this.logger.child({ component: 'NtlmNegotiator' })
    );
    const transport = new EasTransport(
      this.context,
      this.negotiator,
      this.logger.child({ component: 'EasTransport' })
    );

    this.versions = new VersionDetector(this.context, this.logger.child({ component: 'VersionDetector' }));
    this.resolver = new CapabilityResolver(
      this.versions,
      this.logger.child({ component: 'CapabilityResolver' })
    );
    this.syncState = new SyncStateStore(transport, this.logger.child({ component: 'SyncState' }));
    this.folders = new FolderService(transport, this.logger.child({ component: 'Folders' }));

    const native = {
      executor: transport,
      folders: this.folders,
      tokens: this.syncState,
      logger: this.logger.child({ component: 'NativeAdapters' }),
    };
    const soap = { soap: transport, logger: this.logger.child({ component: 'EwsAdapters' }) };

    this.notes = new NotesService(this.resolver, {
      native: new EasNotesAdapter(native),
      soap: new EwsNotesAdapter(soap),
    });
    this.tasks = new TasksService(this.resolver, {
      native: new EasTasksAdapter(native),
      soap: new EwsTasksAdapter(soap),
    });
    this.mail = new MailService(this.resolver, new EasMailAdapter(native), new EwsMailAdapter(soap));
    this.contacts = new ContactsService(this.resolver, {
      native: new EasContactsAdapter(native),
      soap: null,
    });
    this.move = new MoveService(this.resolver, transport, this.logger.child({ component: 'MoveService' }));
    this.search = new SearchService(this.resolver, transport);
    this.provisioning = new ProvisioningService(
      transport,
      this.versions,
      this.context,
      undefined,
      this.logger.child({ component: 'Provisioning' })
    );
  }

  /**
   * Detect the server version and settle the protocol path. Other calls
   * do this on first use; calling it up front surfaces auth errors early.
   */
  async connect(): Promise<EasResult<CapabilityStrategy>> {
    const strategy = await this.resolver.resolve();
    if (strategy.ok) {
      this.logger.info('Connected', { version: strategy.data.version });
    }
    return strategy;
  }

  /**
   * Forget the version, auth session, policy key, folders and sync
   * tokens. Persisted tokens must be restored after reconnecting.
   */
  disconnect(): void {
    this.context.disconnect();
    this.negotiator.reset();
    this.resolver.reset();
    this.syncState.clear();
    this.folders.reset();
    this.logger.debug('Disconnected');
  }
}
