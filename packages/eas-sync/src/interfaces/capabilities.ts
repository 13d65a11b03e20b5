/**
 * @exsync/eas-sync - Capability Interfaces
 *
 * Narrow seams between the entity services and the protocol machinery.
 * Each service depends only on the capabilities it uses, so tests can
 * substitute any one of them with a plain object.
 */

import type { NtlmExchange, NtlmRequest } from '../auth/ntlm';
import type { EasResult } from './result';
import type { RawSyncItem, SyncDelta } from './types';
import type { SyncWithBodyOptions } from '../protocol/request-builder';

export type ResponseParser<T> = (body: string) => T;

/**
 * Runs one ActiveSync command. Thrown EasErrors from `parse` come back
 * as error results.
 */
export interface CommandExecutor {
  execute<T>(command: string, body: string, parse: ResponseParser<T>): Promise<EasResult<T>>;
}

/**
 * Posts an EWS body, wrapped in the envelope for the server generation,
 * and returns the raw SOAP response
 */
export interface SoapExecutor {
  executeEws(action: string, soapBody: string): Promise<EasResult<string>>;
}

/** Well-known folder lookup by FolderType code */
export interface FolderResolver {
  resolveFolderId(type: number): Promise<EasResult<string | null>>;
  /** Full FolderSync, replacing any cached hierarchy */
  refreshHierarchy(): Promise<EasResult<boolean>>;
}

export interface SyncKeyRefresher {
  /** Last committed token, or the zero token */
  getToken(collectionId: string): string;
  /** Obtain a current token, starting from `baseToken` */
  refresh(collectionId: string, baseToken: string): Promise<EasResult<string>>;
  /** Record the token returned by a successful command */
  commit(collectionId: string, token: string): void;
}

export interface CollectionSyncer {
  sync<T>(
    collectionId: string,
    token: string,
    parseItem: (item: RawSyncItem) => T | null,
    options?: SyncWithBodyOptions
  ): Promise<EasResult<SyncDelta<T>>>;

  /** Run `operation` again from the zero token after INVALID_SYNC_KEY */
  withSyncKeyRetry<T>(collectionId: string, operation: () => Promise<EasResult<T>>): Promise<EasResult<T>>;
}

export type SyncTokens = SyncKeyRefresher & CollectionSyncer;

export interface VersionSource {
  detect(): Promise<EasResult<string>>;
  isDetected(): boolean;
  majorVersion(): number;
}

export interface AuthNegotiator {
  /** Null when the server rejected the credentials; never throws */
  negotiate(request: NtlmRequest): Promise<NtlmExchange | null>;
  reset(): void;
}

export interface EndpointResolver {
  readonly activeSyncUrl: string;
  readonly ewsUrl: string;
  commandUrl(command: string): string;
}
