/**
 * @exsync/eas-sync - Provisioning Service
 *
 * Two-phase Provision: fetch the policy for a temporary key, then
 * acknowledge it for the final key. The key is stored on the connection
 * and sent as X-MS-PolicyKey from then on.
 *
 * Commands that answer HTTP 449 fail with PROVISION_REQUIRED; callers run
 * `provision()` and repeat the command themselves.
 */

import { getLogger } from '@exsync/logger';

import { fail, ok } from '../interfaces/result';
import { buildProvisionAck, buildProvisionRequest } from '../protocol/request-builder';
import { STATUS_SUCCESS, parseProvision } from '../protocol/response-parsers';
import { NATIVE_CAPABILITY_MAJOR } from '../transport/version-detector';

import type { ILogger } from '@exsync/logger';
import type { CommandExecutor, VersionSource } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { DeviceInformation } from '../protocol/request-builder';
import type { ProvisionResult } from '../protocol/response-parsers';

/** Policy Status 2: the server has no policy for this device */
const POLICY_NOT_DEFINED = 2;

export interface PolicyKeyHolder {
  policyKey: string | null;
}

export const DEFAULT_DEVICE_INFORMATION: DeviceInformation = {
  model: 'ExSync',
  friendlyName: 'ExSync',
  os: `Node.js ${process.versions.node}`,
  userAgent: 'ExSync/1.0',
};

export class ProvisioningService {
  private readonly logger: ILogger;

  constructor(
    private readonly executor: CommandExecutor,
    private readonly versions: VersionSource,
    private readonly holder: PolicyKeyHolder,
    private readonly device: DeviceInformation = DEFAULT_DEVICE_INFORMATION,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'Provisioning' });
  }

  /**
   * Run both phases. Resolves to the final policy key, or null when the
   * server defines no policy.
   */
  async provision(): Promise<EasResult<string | null>> {
    const version = await this.versions.detect();
    if (!version.ok) {
      return version;
    }
    this.holder.policyKey = null;

    const device = this.versions.majorVersion() >= NATIVE_CAPABILITY_MAJOR ? this.device : null;
    const phase1 = await this.executor.execute('Provision', buildProvisionRequest(device), parseProvision);
    if (!phase1.ok) {
      return phase1;
    }
    const phase1Error = this.check(phase1.data, 'Provision phase 1');
    if (phase1Error) {
      return phase1Error;
    }
    if (phase1.data.policyStatus === POLICY_NOT_DEFINED && phase1.data.policyKey === null) {
      this.logger.info('Server defines no device policy');
      return ok(null);
    }
    if (phase1.data.policyKey === null) {
      return fail('MISSING_FIELD', 'Provision phase 1: response is missing PolicyKey');
    }

    const temporaryKey = phase1.data.policyKey;
    this.holder.policyKey = temporaryKey;

    const phase2 = await this.executor.execute('Provision', buildProvisionAck(temporaryKey), parseProvision);
    if (!phase2.ok) {
      this.holder.policyKey = null;
      return phase2;
    }
    const phase2Error = this.check(phase2.data, 'Provision phase 2');
    if (phase2Error) {
      this.holder.policyKey = null;
      return phase2Error;
    }

    const finalKey = phase2.data.policyKey ?? temporaryKey;
    this.holder.policyKey = finalKey;
    this.logger.info('Device provisioned');
    return ok(finalKey);
  }

  private check(result: ProvisionResult, operation: string): EasResult<never> | null {
    if (result.status !== STATUS_SUCCESS) {
      return fail('STATUS_ERROR', `${operation} failed (Status ${result.status})`, { status: result.status });
    }
    const policyStatus = result.policyStatus;
    if (policyStatus !== null && policyStatus !== STATUS_SUCCESS && policyStatus !== POLICY_NOT_DEFINED) {
      return fail('STATUS_ERROR', `${operation} failed (Policy Status ${policyStatus})`, {
        status: policyStatus,
      });
    }
    return null;
  }
}
