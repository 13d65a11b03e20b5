/**
 * @exsync/eas-sync - Connection Context
 *
 * Everything one account session knows about its server. Created at
 * connect, passed to every component, cleared by `disconnect()`. Nothing
 * in it is shared between accounts.
 */

import { Agent } from 'undici';

import { DEFAULT_WORKSTATION } from '../auth/ntlm';

import type { NtlmSession } from '../auth/ntlm';
import type { EndpointResolver } from '../interfaces/capabilities';

export const EAS_PATH = '/Microsoft-Server-ActiveSync';
export const EWS_PATH = '/EWS/Exchange.asmx';

export const DEFAULT_DEVICE_TYPE = 'ExSync';
export const DEFAULT_TIMEOUT_MS = 30000;

/** Options spread into every fetch this connection makes */
export interface FetchOptions {
  dispatcher?: NonNullable<RequestInit['dispatcher']>;
}

export interface ConnectionSettings {
  /** Server origin, with or without the ActiveSync path */
  serverUrl: string;
  username: string;
  password: string;
  /** NT domain; empty for UPN logins */
  domain: string;
  deviceId: string;
  deviceType?: string;
  /** Accept self-signed and otherwise unverifiable certificates */
  acceptAllCertificates?: boolean;
  timeoutMs?: number;
  workstation?: string;
}

export class ConnectionContext implements EndpointResolver {
  readonly serverUrl: string;
  readonly username: string;
  readonly password: string;
  readonly domain: string;
  readonly deviceId: string;
  readonly deviceType: string;
  readonly acceptAllCertificates: boolean;
  readonly timeoutMs: number;
  readonly workstation: string;
  readonly fetchOptions: FetchOptions;

  protocolVersion: string | null = null;
  versionDetected = false;
  ntlmSession: NtlmSession | null = null;
  policyKey: string | null = null;

  constructor(settings: ConnectionSettings) {
    this.serverUrl = settings.serverUrl;
    this.username = settings.username;
    this.password = settings.password;
    this.domain = settings.domain;
    this.deviceId = settings.deviceId;
    this.deviceType = settings.deviceType ?? DEFAULT_DEVICE_TYPE;
    this.acceptAllCertificates = settings.acceptAllCertificates ?? false;
    this.timeoutMs = settings.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.workstation = settings.workstation ?? DEFAULT_WORKSTATION;
    this.fetchOptions = this.acceptAllCertificates
      ? { dispatcher: new Agent({ connect: { rejectUnauthorized: false } }) }
      : {};
  }

  /**
   * Origin without a trailing slash or ActiveSync path
   */
  get baseUrl(): string {
    let base = this.serverUrl.trim().replace(/\/+$/, '');
    if (base.toLowerCase().endsWith(EAS_PATH.toLowerCase())) {
      base = base.slice(0, -EAS_PATH.length);
    }
    if (!/^https?:\/\//i.test(base)) {
      base = `https://${base}`;
    }
    return base;
  }

  /** `DOMAIN\user`, or the bare user name without a domain */
  get qualifiedUser(): string {
    return this.domain ? `${this.domain}\\${this.username}` : this.username;
  }

  get activeSyncUrl(): string {
    return `${this.baseUrl}${EAS_PATH}`;
  }

  get ewsUrl(): string {
    return `${this.baseUrl}${EWS_PATH}`;
  }

  commandUrl(command: string): string {
    const params = new URLSearchParams({
      Cmd: command,
      User: this.qualifiedUser,
      DeviceId: this.deviceId,
      DeviceType: this.deviceType,
    });
    return `${this.activeSyncUrl}?${params.toString()}`;
  }

  basicAuthorization(): string {
    const token = Buffer.from(`${this.qualifiedUser}:${this.password}`, 'utf8').toString('base64');
    return `Basic ${token}`;
  }

  /**
   * Drop everything learned from the server
   */
  disconnect(): void {
    this.protocolVersion = null;
    this.versionDetected = false;
    this.ntlmSession = null;
    this.policyKey = null;
  }
}
