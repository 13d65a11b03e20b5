/**
 * @exsync/eas-sync
 *
 * Exchange ActiveSync synchronization engine with an EWS SOAP fallback.
 *
 * This package provides:
 * - EasClient, which wires one account's connection together
 * - Notes, Tasks, Mail, Contacts, Move, Search and Folder services that pick the
 *   ActiveSync or EWS path from the detected protocol version
 * - SyncStateStore for per-collection sync tokens
 * - Request builders and response parsers for both wire formats
 * - NTLMv2 negotiation over fetch
 *
 * @example
 * ```typescript
 * import { EasClient, applyDelta } from '@exsync/eas-sync';
 *
 * const client = new EasClient(settings);
 * const delta = await client.mail.syncFolder(inboxId, savedSyncKey);
 * if (delta.ok) {
 *   messages = applyDelta(messages, delta.data, (m) => m.serverId);
 *   await saveSyncKey(inboxId, delta.data.nextSyncKey);
 * }
 * ```
 */

// Interfaces and Types
export * from './interfaces/types';
export * from './interfaces/errors';
export * from './interfaces/result';
export type * from './interfaces/capabilities';
export type * from './interfaces/backends';

// Protocol
export * from './protocol/xml-escape';
export * from './protocol/xml-extractor';
export * from './protocol/request-builder';
export * from './protocol/soap-builder';
export * from './protocol/response-parsers';
export * from './protocol/item-parsers';
export * from './protocol/wbxml';

// Auth and Transport
export * from './auth/ntlm';
export { md4 } from './auth/md4';
export * from './transport/connection-context';
export * from './transport/version-detector';
export * from './transport/eas-transport';

// Sync State
export * from './sync/sync-state';

// Adapters
export { EasNotesAdapter } from './adapters/eas-notes-adapter';
export { EwsNotesAdapter } from './adapters/ews-notes-adapter';
export { EasTasksAdapter } from './adapters/eas-tasks-adapter';
export { EwsTasksAdapter } from './adapters/ews-tasks-adapter';
export { EasMailAdapter } from './adapters/eas-mail-adapter';
export { EwsMailAdapter } from './adapters/ews-mail-adapter';
export { EasContactsAdapter } from './adapters/eas-contacts-adapter';
export type { NativeAdapterDeps } from './adapters/eas-commands';
export type { SoapAdapterDeps } from './adapters/ews-commands';

// Services
export * from './services';

// Client
export { EasClient } from './client/eas-client';
