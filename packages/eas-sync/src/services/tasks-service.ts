/**
 * @exsync/eas-sync - Tasks Service
 */

import { NativeMinimum } from './capability-strategy';

import type { TasksBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { Task, TaskInput } from '../interfaces/types';
import type { CapabilityResolver, PathImplementations } from './capability-strategy';

export class TasksService implements TasksBackend {
  constructor(
    private readonly resolver: CapabilityResolver,
    private readonly backends: PathImplementations<TasksBackend>
  ) {}

  async createTask(task: TaskInput): Promise<EasResult<string>> {
    const backend = await this.backend('createTask');
    return backend.ok ? backend.data.createTask(task) : backend;
  }

  async updateTask(serverId: string, task: TaskInput): Promise<EasResult<boolean>> {
    const backend = await this.backend('updateTask');
    return backend.ok ? backend.data.updateTask(serverId, task) : backend;
  }

  async deleteTask(serverId: string): Promise<EasResult<boolean>> {
    const backend = await this.backend('deleteTask');
    return backend.ok ? backend.data.deleteTask(serverId) : backend;
  }

  async deleteTaskPermanently(serverId: string): Promise<EasResult<boolean>> {
    const backend = await this.backend('deleteTaskPermanently');
    return backend.ok ? backend.data.deleteTaskPermanently(serverId) : backend;
  }

  async restoreTask(serverId: string): Promise<EasResult<string>> {
    const backend = await this.backend('restoreTask');
    return backend.ok ? backend.data.restoreTask(serverId) : backend;
  }

  async syncTasks(): Promise<EasResult<Task[]>> {
    const backend = await this.backend('syncTasks');
    return backend.ok ? backend.data.syncTasks() : backend;
  }

  private backend(operation: string): Promise<EasResult<TasksBackend>> {
    return this.resolver.select(operation, this.backends, NativeMinimum.ENTITIES);
  }
}
