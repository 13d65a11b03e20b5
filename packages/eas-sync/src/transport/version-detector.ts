/**
 * @exsync/eas-sync - Version Detector
 *
 * Sends OPTIONS to the ActiveSync endpoint and picks the highest
 * protocol version both sides speak. The result lives on the
 * ConnectionContext until disconnect.
 */

import { getLogger } from '@exsync/logger';

import { getErrorMessage } from '../interfaces/errors';
import { fail, ok } from '../interfaces/result';

import type { ILogger } from '@exsync/logger';
import type { VersionSource } from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { ConnectionContext } from './connection-context';

/** Client preference, best first */
export const SUPPORTED_VERSIONS = ['14.1', '14.0', '12.1', '12.0'] as const;

/** Oldest supported version, assumed when the OPTIONS request fails */
export const FALLBACK_VERSION = '12.0';

/** First major version with native Notes and full Tasks support */
export const NATIVE_CAPABILITY_MAJOR = 14;

export function majorVersionOf(version: string | null): number {
  const major = parseInt((version ?? FALLBACK_VERSION).split('.')[0] ?? '', 10);
  return isNaN(major) ? 0 : major;
}

/**
 * Best supported entry of an MS-ASProtocolVersions header. When nothing
 * matches, the highest advertised version is returned so capability checks
 * can reject it; null when the header is empty.
 */
export function selectProtocolVersion(header: string | null): string | null {
  const advertised = (header ?? '')
    .split(',')
    .map((version) => version.trim())
    .filter((version) => version.length > 0);

  const supported = SUPPORTED_VERSIONS.find((version) => advertised.includes(version));
  if (supported) {
    return supported;
  }
  const sorted = [...advertised].sort((a, b) => parseFloat(b) - parseFloat(a));
  return sorted[0] ?? null;
}

export class VersionDetector implements VersionSource {
  private readonly logger: ILogger;

  constructor(
    private readonly context: ConnectionContext,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'VersionDetector' });
  }

  /**
   * Cached after the first call. Only a credential rejection is reported
   * as an error; every other failure settles on FALLBACK_VERSION.
   */
  async detect(): Promise<EasResult<string>> {
    if (this.context.versionDetected) {
      return ok(this.getVersion());
    }

    let response: Response;
    try {
      response = await fetch(this.context.activeSyncUrl, {
        method: 'OPTIONS',
        headers: { Authorization: this.context.basicAuthorization() },
        signal: AbortSignal.timeout(this.context.timeoutMs),
        ...this.context.fetchOptions,
      });
    } catch (error) {
      return ok(this.settle(FALLBACK_VERSION, `OPTIONS failed: ${getErrorMessage(error)}`));
    }

    if (response.status === 401) {
      const challenge = response.headers.get('www-authenticate') ?? '';
      // NTLM-only servers refuse Basic here; the transport negotiates later
      if (/\bNTLM\b/i.test(challenge) && !/\bBasic\b/i.test(challenge)) {
        return ok(this.settle(FALLBACK_VERSION, 'server requires NTLM for OPTIONS'));
      }
      return fail('AUTH_FAILED', 'Server rejected credentials during version detection', {
        status: 401,
      });
    }

    if (!response.ok) {
      return ok(this.settle(FALLBACK_VERSION, `OPTIONS returned HTTP ${response.status}`));
    }

    const advertised = response.headers.get('ms-asprotocolversions');
    const version = selectProtocolVersion(advertised);
    if (version === null) {
      return ok(this.settle(FALLBACK_VERSION, 'no MS-ASProtocolVersions header'));
    }

    this.logger.info('Protocol version detected', { version, advertised });
    return ok(this.settle(version, null));
  }

  isDetected(): boolean {
    return this.context.versionDetected;
  }

  /** Detected version, or the fallback before detection */
  getVersion(): string {
    return this.context.protocolVersion ?? FALLBACK_VERSION;
  }

  majorVersion(): number {
    return majorVersionOf(this.getVersion());
  }

  /** Exchange 2007 speaks only the 12.x protocol family */
  isExchange2007(): boolean {
    return this.majorVersion() < NATIVE_CAPABILITY_MAJOR;
  }

  private settle(version: string, fallbackReason: string | null): string {
    if (fallbackReason !== null) {
      this.logger.warn('Version detection fell back', { version, reason: fallbackReason });
    }
    this.context.protocolVersion = version;
    this.context.versionDetected = true;
    return version;
  }
}
