/**
 * @exsync/eas-sync - Native Tasks Adapter
 */

import { ok } from '../interfaces/result';
import { FolderType } from '../interfaces/types';
import { parseTask } from '../protocol/item-parsers';
import { buildSyncDelete, buildTaskCreate, buildTaskUpdate } from '../protocol/request-builder';
import { EasCollectionCommands, generateClientId } from './eas-commands';

import type { TasksBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { RawSyncItem, Task, TaskInput } from '../interfaces/types';
import type { TaskContent } from '../protocol/request-builder';
import type { NativeAdapterDeps } from './eas-commands';

const taskKey = (task: Task): string => task.serverId;

/** Deleted Items entries carrying task properties */
function parseDeletedTask(item: RawSyncItem): Task | null {
  if (!item.applicationData.includes('<tasks:')) {
    return null;
  }
  return { ...parseTask(item), isDeleted: true };
}

/** Omit-if-absent: unset optional fields stay out of the request */
export function toTaskContent(task: TaskInput): TaskContent {
  return {
    subject: task.subject,
    body: task.body ?? '',
    importance: task.importance ?? 1,
    complete: task.complete ?? false,
    ...(task.startDate !== undefined ? { startDate: task.startDate } : {}),
    ...(task.dueDate !== undefined ? { dueDate: task.dueDate } : {}),
    ...(task.reminderTime !== undefined ? { reminderTime: task.reminderTime } : {}),
    ...(task.categories !== undefined ? { categories: task.categories } : {}),
  };
}

export class EasTasksAdapter implements TasksBackend {
  private readonly commands: EasCollectionCommands;

  constructor(
    deps: NativeAdapterDeps,
    private readonly now: () => number = Date.now
  ) {
    this.commands = new EasCollectionCommands(deps, 'EasTasks');
  }

  async createTask(task: TaskInput): Promise<EasResult<string>> {
    const collectionId = await this.commands.resolveCollection(FolderType.TASKS, 'Tasks');
    if (!collectionId.ok) {
      return collectionId;
    }
    const syncKey = await this.commands.freshToken(collectionId.data);
    if (!syncKey.ok) {
      return syncKey;
    }

    const clientId = generateClientId();
    const request = buildTaskCreate(syncKey.data, collectionId.data, clientId, toTaskContent(task));
    return this.commands.add('Create task', collectionId.data, clientId, request);
  }

  async updateTask(serverId: string, task: TaskInput): Promise<EasResult<boolean>> {
    const collectionId = await this.commands.resolveCollection(FolderType.TASKS, 'Tasks');
    if (!collectionId.ok) {
      return collectionId;
    }
    const syncKey = await this.commands.freshToken(collectionId.data);
    if (!syncKey.ok) {
      return syncKey;
    }

    const request = buildTaskUpdate(syncKey.data, collectionId.data, serverId, toTaskContent(task), {
      modern: true,
      completedAt: this.now(),
    });
    return this.commands.change('Update task', collectionId.data, request);
  }

  async deleteTask(serverId: string): Promise<EasResult<boolean>> {
    return this.deleteFrom(FolderType.TASKS, 'Tasks', serverId, true);
  }

  async deleteTaskPermanently(serverId: string): Promise<EasResult<boolean>> {
    return this.deleteFrom(FolderType.DELETED_ITEMS, 'Deleted Items', serverId, false);
  }

  async restoreTask(serverId: string): Promise<EasResult<string>> {
    const deletedId = await this.commands.resolveCollection(FolderType.DELETED_ITEMS, 'Deleted Items');
    if (!deletedId.ok) {
      return deletedId;
    }
    const tasksId = await this.commands.resolveCollection(FolderType.TASKS, 'Tasks');
    if (!tasksId.ok) {
      return tasksId;
    }
    return this.commands.move('Restore task', serverId, deletedId.data, tasksId.data);
  }

  async syncTasks(): Promise<EasResult<Task[]>> {
    const hierarchy = await this.commands.refreshHierarchy();
    if (!hierarchy.ok) {
      return hierarchy;
    }
    const tasksId = await this.commands.resolveCollection(FolderType.TASKS, 'Tasks');
    if (!tasksId.ok) {
      return tasksId;
    }
    const tasks = await this.commands.downloadAll(tasksId.data, parseTask, taskKey);
    if (!tasks.ok) {
      return tasks;
    }

    const deletedId = await this.commands.resolveCollection(FolderType.DELETED_ITEMS, 'Deleted Items');
    if (!deletedId.ok) {
      return deletedId;
    }
    const deleted = await this.commands.downloadAll(deletedId.data, parseDeletedTask, taskKey);
    if (!deleted.ok) {
      return deleted;
    }

    this.commands.logger.info('Tasks synced', { tasks: tasks.data.length, deleted: deleted.data.length });
    return ok([...tasks.data, ...deleted.data]);
  }

  private async deleteFrom(
    folderType: number,
    label: string,
    serverId: string,
    deletesAsMoves: boolean
  ): Promise<EasResult<boolean>> {
    const collectionId = await this.commands.resolveCollection(folderType, label);
    if (!collectionId.ok) {
      return collectionId;
    }
    const syncKey = await this.commands.freshToken(collectionId.data);
    if (!syncKey.ok) {
      return syncKey;
    }

    const request = buildSyncDelete(syncKey.data, collectionId.data, serverId, deletesAsMoves);
    const operation = deletesAsMoves ? 'Delete task' : 'Permanently delete task';
    return this.commands.delete(operation, collectionId.data, request);
  }
}
