/**
 * @exsync/eas-sync - Services
 */

export * from './capability-strategy';
export * from './folder-service';
export * from './notes-service';
export * from './tasks-service';
export * from './mail-service';
export * from './contacts-service';
export * from './move-service';
export * from './search-service';
export * from './provisioning-service';
