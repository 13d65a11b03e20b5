/**
 * @exsync/eas-sync - EWS Tasks Adapter
 *
 * Tasks for Exchange 2007, which rejects Body and the Utc* dates in an
 * ActiveSync Change.
 */

import { ok } from '../interfaces/result';
import { parseEwsTasks } from '../protocol/item-parsers';
import { buildCreateTaskItem, buildUpdateTaskItem } from '../protocol/soap-builder';
import { DistinguishedFolder, EwsItemCommands } from './ews-commands';

import type { TasksBackend } from '../interfaces/backends';
import type { EasResult } from '../interfaces/result';
import type { Task, TaskInput } from '../interfaces/types';
import type { EwsTaskContent } from '../protocol/soap-builder';
import type { SoapAdapterDeps } from './ews-commands';

function toEwsTask(task: TaskInput): EwsTaskContent {
  return {
    subject: task.subject,
    body: task.body ?? '',
    importance: task.importance ?? 1,
    ...(task.dueDate !== undefined ? { dueDate: task.dueDate } : {}),
    ...(task.complete !== undefined ? { complete: task.complete } : {}),
  };
}

export class EwsTasksAdapter implements TasksBackend {
  private readonly commands: EwsItemCommands;

  constructor(deps: SoapAdapterDeps) {
    this.commands = new EwsItemCommands(deps, 'EwsTasks');
  }

  async createTask(task: TaskInput): Promise<EasResult<string>> {
    return this.commands.create('Create task', buildCreateTaskItem(toEwsTask(task)));
  }

  async updateTask(serverId: string, task: TaskInput): Promise<EasResult<boolean>> {
    return this.commands.update('Update task', DistinguishedFolder.TASKS, serverId, (itemId) =>
      buildUpdateTaskItem(itemId, toEwsTask(task))
    );
  }

  async deleteTask(serverId: string): Promise<EasResult<boolean>> {
    return this.commands.delete('Delete task', DistinguishedFolder.TASKS, serverId, 'MoveToDeletedItems');
  }

  async deleteTaskPermanently(serverId: string): Promise<EasResult<boolean>> {
    return this.commands.delete(
      'Permanently delete task',
      DistinguishedFolder.DELETED_ITEMS,
      serverId,
      'HardDelete'
    );
  }

  async restoreTask(serverId: string): Promise<EasResult<string>> {
    return this.commands.move(
      'Restore task',
      DistinguishedFolder.DELETED_ITEMS,
      serverId,
      DistinguishedFolder.TASKS
    );
  }

  async syncTasks(): Promise<EasResult<Task[]>> {
    const tasks = await this.commands.listItems(DistinguishedFolder.TASKS, parseEwsTasks);
    if (!tasks.ok) {
      return tasks;
    }
    const deleted = await this.commands.listItems(DistinguishedFolder.DELETED_ITEMS, parseEwsTasks);
    if (!deleted.ok) {
      return deleted;
    }

    this.commands.logger.info('Tasks synced', { tasks: tasks.data.length, deleted: deleted.data.length });
    return ok([...tasks.data, ...deleted.data.map((task) => ({ ...task, isDeleted: true }))]);
  }
}
