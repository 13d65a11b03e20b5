/**
 * @exsync/eas-sync - Search Service
 *
 * Global Address List and mailbox search through the Search command.
 * Exchange 2007 EWS has no QueryString, so there is no EWS path.
 */

import { buildSearchGal, buildSearchMailbox, DEFAULT_GAL_RESULTS } from '../protocol/request-builder';
import { parseGalResults, parseMailboxSearch } from '../protocol/response-parsers';
import { NativeMinimum } from './capability-strategy';

import type { CommandExecutor } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { GalContact, MailboxSearchHit } from '../interfaces/types';
import type { CapabilityResolver } from './capability-strategy';

export interface MailboxQuery {
  /** Limit to one collection; all mail folders when absent */
  collectionId?: string;
  maxResults?: number;
}

const DEFAULT_MAILBOX_RESULTS = 100;

export class SearchService {
  constructor(
    private readonly resolver: CapabilityResolver,
    private readonly executor: CommandExecutor
  ) {}

  async searchGal(query: string, maxResults: number = DEFAULT_GAL_RESULTS): Promise<EasResult<GalContact[]>> {
    const executor = await this.native('searchGal');
    if (!executor.ok) {
      return executor;
    }
    return executor.data.execute('Search', buildSearchGal(query, maxResults), parseGalResults);
  }

  async searchMailbox(query: string, options: MailboxQuery = {}): Promise<EasResult<MailboxSearchHit[]>> {
    const executor = await this.native('searchMailbox');
    if (!executor.ok) {
      return executor;
    }

    const maxResults = Math.max(options.maxResults ?? DEFAULT_MAILBOX_RESULTS, 1);
    const request = buildSearchMailbox(query, {
      ...(options.collectionId ? { collectionId: options.collectionId } : {}),
      rangeStart: 0,
      rangeEnd: maxResults - 1,
    });
    return executor.data.execute('Search', request, parseMailboxSearch);
  }

  private native(operation: string): Promise<EasResult<CommandExecutor>> {
    return this.resolver.select(operation, { native: this.executor, soap: null }, NativeMinimum.CORE);
  }
}
