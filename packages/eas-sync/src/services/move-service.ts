/**
 * @exsync/eas-sync - Move Service
 *
 * Batched MoveItems. The server assigns a new id to every moved item;
 * callers replace their ids with the returned ones.
 */

import { getLogger } from '@exsync/logger';

import { fail, ok } from '../interfaces/result';
import { buildMoveItems } from '../protocol/request-builder';
import { MOVE_SUCCESS_STATUSES, parseMoveItems } from '../protocol/response-parsers';
import { NativeMinimum } from './capability-strategy';

import type { ILogger } from '@exsync/logger';
import type { CommandExecutor } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { MoveSource } from '../interfaces/types';
import type { CapabilityResolver } from './capability-strategy';

export class MoveService {
  private readonly logger: ILogger;

  constructor(
    private readonly resolver: CapabilityResolver,
    private readonly executor: CommandExecutor,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'MoveService' });
  }

  /**
   * Map from source id to new id for each item that moved. Fails only
   * when no item moved; a partial move is reported as success.
   */
  async moveItems(
    sources: readonly MoveSource[],
    dstFolderId: string
  ): Promise<EasResult<Map<string, string>>> {
    if (sources.length === 0) {
      return ok(new Map());
    }

    const path = await this.resolver.select(
      'moveItems',
      { native: this.executor, soap: null },
      NativeMinimum.CORE
    );
    if (!path.ok) {
      return path;
    }

    const result = await path.data.execute('MoveItems', buildMoveItems(sources, dstFolderId), parseMoveItems);
    if (!result.ok) {
      return result;
    }

    const moved = new Map<string, string>();
    const failures: string[] = [];
    for (const response of result.data) {
      if (MOVE_SUCCESS_STATUSES.has(response.status)) {
        moved.set(response.srcMsgId, response.dstMsgId ?? response.srcMsgId);
      } else {
        failures.push(`${response.srcMsgId} (Status ${response.status})`);
      }
    }

    if (moved.size === 0) {
      return fail('STATUS_ERROR', `MoveItems failed: ${failures.join(', ') || 'no responses'}`);
    }
    if (failures.length > 0) {
      this.logger.warn('Some items were not moved', { moved: moved.size, failed: failures.length });
    }
    return ok(moved);
  }
}
