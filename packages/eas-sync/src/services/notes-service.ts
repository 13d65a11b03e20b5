/**
 * @exsync/eas-sync - Notes Service
 *
 * Public notes operations. Each call asks the CapabilityResolver for the
 * backend matching the detected protocol version, so servers below 14
 * are served over EWS with the same contract.
 */

import { NativeMinimum } from './capability-strategy';

import type { NotesBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { Note } from '../interfaces/types';
import type { CapabilityResolver, PathImplementations } from './capability-strategy';

export class NotesService implements NotesBackend {
  constructor(
    private readonly resolver: CapabilityResolver,
    private readonly backends: PathImplementations<NotesBackend>
  ) {}

  async createNote(
    subject: string,
    body: string,
    categories?: readonly string[]
  ): Promise<EasResult<string>> {
    const backend = await this.backend('createNote');
    return backend.ok ? backend.data.createNote(subject, body, categories) : backend;
  }

  async updateNote(serverId: string, subject: string, body: string): Promise<EasResult<boolean>> {
    const backend = await this.backend('updateNote');
    return backend.ok ? backend.data.updateNote(serverId, subject, body) : backend;
  }

  async deleteNote(serverId: string): Promise<EasResult<boolean>> {
    const backend = await this.backend('deleteNote');
    return backend.ok ? backend.data.deleteNote(serverId) : backend;
  }

  async deleteNotePermanently(serverId: string): Promise<EasResult<boolean>> {
    const backend = await this.backend('deleteNotePermanently');
    return backend.ok ? backend.data.deleteNotePermanently(serverId) : backend;
  }

  async restoreNote(serverId: string): Promise<EasResult<string>> {
    const backend = await this.backend('restoreNote');
    return backend.ok ? backend.data.restoreNote(serverId) : backend;
  }

  async syncNotes(): Promise<EasResult<Note[]>> {
    const backend = await this.backend('syncNotes');
    return backend.ok ? backend.data.syncNotes() : backend;
  }

  private backend(operation: string): Promise<EasResult<NotesBackend>> {
    return this.resolver.select(operation, this.backends, NativeMinimum.ENTITIES);
  }
}
