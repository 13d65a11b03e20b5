/**
 * @exsync/eas-sync - NTLM Negotiator
 *
 * NTLMv2 challenge/response over HTTP. The three legs (Negotiate,
 * Challenge, Authenticate) must travel on one keep-alive connection;
 * Node's fetch pools sockets per origin, so sequential requests reuse it.
 *
 * State: NO_SESSION -> CHALLENGE_SENT -> SESSION_ESTABLISHED, or FAILED.
 */

import { createHmac, randomBytes } from 'crypto';

import { getLogger } from '@exsync/logger';

import { getErrorMessage } from '../interfaces/errors';
import { md4 } from './md4';

import type { ILogger } from '@exsync/logger';
import type { AuthNegotiator } from '../interfaces/capabilities';
import type { FetchOptions } from '../transport/connection-context';

// =============================================================================
// Constants
// =============================================================================

export const NtlmFlags = {
  NEGOTIATE_UNICODE: 0x00000001,
  NEGOTIATE_OEM: 0x00000002,
  REQUEST_TARGET: 0x00000004,
  NEGOTIATE_NTLM: 0x00000200,
  NEGOTIATE_ALWAYS_SIGN: 0x00008000,
  NEGOTIATE_EXTENDED_SESSION_SECURITY: 0x00080000,
  NEGOTIATE_VERSION: 0x02000000,
  NEGOTIATE_128: 0x20000000,
  NEGOTIATE_56: 0x80000000,
} as const;

const SIGNATURE = Buffer.from('NTLMSSP\0', 'ascii');

const TYPE1_FLAGS =
  (NtlmFlags.NEGOTIATE_UNICODE |
    NtlmFlags.NEGOTIATE_OEM |
    NtlmFlags.REQUEST_TARGET |
    NtlmFlags.NEGOTIATE_NTLM |
    NtlmFlags.NEGOTIATE_ALWAYS_SIGN |
    NtlmFlags.NEGOTIATE_EXTENDED_SESSION_SECURITY |
    NtlmFlags.NEGOTIATE_VERSION |
    NtlmFlags.NEGOTIATE_128 |
    NtlmFlags.NEGOTIATE_56) >>>
  0;

const TYPE3_FLAGS =
  (NtlmFlags.NEGOTIATE_UNICODE |
    NtlmFlags.NEGOTIATE_NTLM |
    NtlmFlags.NEGOTIATE_ALWAYS_SIGN |
    NtlmFlags.NEGOTIATE_EXTENDED_SESSION_SECURITY |
    NtlmFlags.NEGOTIATE_VERSION |
    NtlmFlags.NEGOTIATE_128 |
    NtlmFlags.NEGOTIATE_56) >>>
  0;

const TYPE1_HEADER_SIZE = 32;
const TYPE3_HEADER_SIZE = 88;

/** Windows 6.1, NTLM revision 15 */
const VERSION = Buffer.from([6, 1, 0, 0, 0, 0, 0, 15]);

/** Milliseconds between 1601-01-01 and the Unix epoch */
const FILETIME_EPOCH_OFFSET_MS = 11644473600000n;

export const DEFAULT_WORKSTATION = 'NODE';

// =============================================================================
// Types
// =============================================================================

export type NtlmState = 'NO_SESSION' | 'CHALLENGE_SENT' | 'SESSION_ESTABLISHED' | 'FAILED';

export interface NtlmCredentials {
  username: string;
  password: string;
  domain: string;
  workstation: string;
}

export interface NtlmChallenge {
  serverChallenge: Buffer;
  targetInfo: Buffer;
  flags: number;
}

/** Fixed inputs for Type 3 construction; random and current time by default */
export interface Type3Options {
  clientChallenge?: Buffer;
  timestamp?: number;
}

export interface NtlmSession {
  scheme: 'NTLM';
  establishedAt: number;
}

export interface NtlmRequest {
  url: string;
  body: string | Uint8Array;
  /** Request headers other than Authorization */
  headers: Record<string, string>;
  timeoutMs: number;
  fetchOptions: FetchOptions;
}

/** Final response of a completed negotiation */
export interface NtlmExchange {
  session: NtlmSession;
  status: number;
  contentType: string | null;
  body: Buffer;
}

// =============================================================================
// Message Construction
// =============================================================================

function securityBuffer(target: Buffer, position: number, length: number, offset: number): void {
  target.writeUInt16LE(length, position);
  target.writeUInt16LE(length, position + 2);
  target.writeUInt32LE(offset, position + 4);
}

/**
 * Type 1 (Negotiate). Domain and workstation travel as uppercase OEM text.
 */
export function createType1Message(domain: string, workstation: string): Buffer {
  const domainBytes = Buffer.from(domain.toUpperCase(), 'ascii');
  const workstationBytes = Buffer.from(workstation.toUpperCase(), 'ascii');

  const header = Buffer.alloc(TYPE1_HEADER_SIZE);
  SIGNATURE.copy(header, 0);
  header.writeUInt32LE(1, 8);
  header.writeUInt32LE(TYPE1_FLAGS, 12);
  securityBuffer(header, 16, domainBytes.length, TYPE1_HEADER_SIZE);
  securityBuffer(header, 24, workstationBytes.length, TYPE1_HEADER_SIZE + domainBytes.length);

  return Buffer.concat([header, domainBytes, workstationBytes]);
}

/**
 * Type 2 (Challenge). Null unless the signature and message type match.
 */
export function parseType2Message(message: Buffer): NtlmChallenge | null {
  if (message.length < 32 || !message.subarray(0, 8).equals(SIGNATURE) || message.readUInt32LE(8) !== 2) {
    return null;
  }

  let targetInfo = Buffer.alloc(0);
  if (message.length >= 48) {
    const length = message.readUInt16LE(40);
    const offset = message.readUInt32LE(44);
    if (offset + length <= message.length) {
      targetInfo = Buffer.from(message.subarray(offset, offset + length));
    }
  }

  return {
    serverChallenge: Buffer.from(message.subarray(24, 32)),
    targetInfo,
    flags: message.readUInt32LE(20),
  };
}

/**
 * Challenge from a WWW-Authenticate value. Several challenges may be
 * folded into one comma-separated header.
 */
export function parseChallengeHeader(header: string | null): NtlmChallenge | null {
  if (!header) {
    return null;
  }
  const entry = header
    .split(',')
    .map((part) => part.trim())
    .find((part) => part.toUpperCase().startsWith('NTLM '));
  const encoded = entry?.slice(5).trim();
  if (!encoded) {
    return null;
  }
  return parseType2Message(Buffer.from(encoded, 'base64'));
}

function hmacMd5(key: Buffer, ...data: Buffer[]): Buffer {
  const hmac = createHmac('md5', key);
  data.forEach((chunk) => hmac.update(chunk));
  return hmac.digest();
}

/**
 * NTOWFv2: HMAC-MD5 keyed by the MD4 password hash over USER + DOMAIN
 */
export function computeNtlmV2Hash(username: string, password: string, domain: string): Buffer {
  const ntlmHash = md4(Buffer.from(password, 'utf16le'));
  const identity = Buffer.from(username.toUpperCase() + domain.toUpperCase(), 'utf16le');
  return hmacMd5(ntlmHash, identity);
}

function fileTime(epochMillis: number): Buffer {
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64LE((BigInt(Math.trunc(epochMillis)) + FILETIME_EPOCH_OFFSET_MS) * 10000n);
  return buffer;
}

function createBlob(clientChallenge: Buffer, targetInfo: Buffer, timestamp: number): Buffer {
  const reserved = Buffer.alloc(4);
  return Buffer.concat([
    Buffer.from([0x01, 0x01, 0x00, 0x00]),
    reserved,
    fileTime(timestamp),
    clientChallenge,
    reserved,
    targetInfo,
    reserved,
  ]);
}

/**
 * Type 3 (Authenticate) carrying NTLMv2 and LMv2 responses
 */
export function createType3Message(
  credentials: NtlmCredentials,
  challenge: NtlmChallenge,
  options: Type3Options = {}
): Buffer {
  const clientChallenge = options.clientChallenge ?? randomBytes(8);
  const timestamp = options.timestamp ?? Date.now();

  const hash = computeNtlmV2Hash(credentials.username, credentials.password, credentials.domain);
  const blob = createBlob(clientChallenge, challenge.targetInfo, timestamp);
  const ntResponse = Buffer.concat([hmacMd5(hash, challenge.serverChallenge, blob), blob]);
  const lmProof = hmacMd5(hash, challenge.serverChallenge, clientChallenge);
  const lmResponse = Buffer.concat([lmProof, clientChallenge]);

  const payloads = [
    lmResponse,
    ntResponse,
    Buffer.from(credentials.domain.toUpperCase(), 'utf16le'),
    Buffer.from(credentials.username, 'utf16le'),
    Buffer.from(credentials.workstation.toUpperCase(), 'utf16le'),
  ];

  const header = Buffer.alloc(TYPE3_HEADER_SIZE);
  SIGNATURE.copy(header, 0);
  header.writeUInt32LE(3, 8);

  let offset = TYPE3_HEADER_SIZE;
  payloads.forEach((payload, index) => {
    securityBuffer(header, 12 + index * 8, payload.length, offset);
    offset += payload.length;
  });
  // Encrypted random session key: empty, pointing past the payloads
  securityBuffer(header, 52, 0, offset);
  header.writeUInt32LE(TYPE3_FLAGS, 60);
  VERSION.copy(header, 64);
  // Bytes 72..87 hold the MIC, left zeroed

  return Buffer.concat([header, ...payloads]);
}

export function toAuthorizationHeader(message: Buffer): string {
  return `NTLM ${message.toString('base64')}`;
}

// =============================================================================
// Negotiator
// =============================================================================

export class NtlmNegotiator implements AuthNegotiator {
  private state: NtlmState = 'NO_SESSION';
  private readonly logger: ILogger;

  constructor(
    private readonly credentials: NtlmCredentials,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'NtlmNegotiator' });
  }

  getState(): NtlmState {
    return this.state;
  }

  reset(): void {
    this.state = 'NO_SESSION';
  }

  /**
   * Run the handshake for one request and return the server's final
   * response. Any response other than 401 ends the exchange, so protocol
   * statuses (449, SOAP faults) reach the caller intact. Returns null and
   * moves to FAILED when the server rejects the credentials or the
   * exchange cannot complete; never throws.
   */
  async negotiate(request: NtlmRequest): Promise<NtlmExchange | null> {
    try {
      const type1 = createType1Message(this.credentials.domain, this.credentials.workstation);
      const first = await this.post(request, toAuthorizationHeader(type1));
      this.state = 'CHALLENGE_SENT';

      if (first.status !== 401) {
        return await this.establish(first);
      }

      const challenge = parseChallengeHeader(first.headers.get('www-authenticate'));
      // Drain so the socket returns to the pool for the final leg
      await first.text();
      if (!challenge) {
        return this.fail('server did not return an NTLM challenge');
      }

      const type3 = createType3Message(this.credentials, challenge);
      const second = await this.post(request, toAuthorizationHeader(type3));
      if (second.status === 401) {
        await second.body?.cancel();
        return this.fail('credentials rejected');
      }
      return await this.establish(second);
    } catch (error) {
      return this.fail(getErrorMessage(error));
    }
  }

  private post(request: NtlmRequest, authorization: string): Promise<Response> {
    return fetch(request.url, {
      method: 'POST',
      headers: { ...request.headers, Authorization: authorization, Connection: 'keep-alive' },
      body: request.body,
      signal: AbortSignal.timeout(request.timeoutMs),
      ...request.fetchOptions,
    });
  }

  private async establish(response: Response): Promise<NtlmExchange> {
    const body = Buffer.from(await response.arrayBuffer());
    this.state = 'SESSION_ESTABLISHED';
    this.logger.debug('NTLM exchange complete', { status: response.status });
    return {
      session: { scheme: 'NTLM', establishedAt: Date.now() },
      status: response.status,
      contentType: response.headers.get('content-type'),
      body,
    };
  }

  private fail(reason: string): null {
    this.state = 'FAILED';
    this.logger.warn('NTLM negotiation failed', { reason });
    return null;
  }
}
