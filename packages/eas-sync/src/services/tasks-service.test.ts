/**
 * Tests for the Tasks Service
 */

import { EasTasksAdapter, toTaskContent } from '../adapters/eas-tasks-adapter';
import { EwsTasksAdapter } from '../adapters/ews-tasks-adapter';
import { FolderType } from '../interfaces/types';
import { SyncStateStore } from '../sync/sync-state';
import {
  FixedVersion,
  ScriptedExecutor,
  addCommand,
  ewsId,
  ewsReply,
  findItemReply,
  folderSyncReply,
  noteData,
  syncReply,
} from '../testing/fakes';
import { CapabilityResolver } from './capability-strategy';
import { FolderService } from './folder-service';
import { TasksService } from './tasks-service';

const HIERARCHY = [
  ['4', FolderType.DELETED_ITEMS, 'Deleted Items'],
  ['7', FolderType.TASKS, 'Tasks'],
] as const;

const DUE = Date.UTC(2024, 1, 1);
const NOW = Date.UTC(2024, 0, 15, 12);

function createService(executor: ScriptedExecutor, version: string): TasksService {
  const deps = {
    executor,
    folders: new FolderService(executor),
    tokens: new SyncStateStore(executor),
  };
  return new TasksService(new CapabilityResolver(new FixedVersion(version)), {
    native: new EasTasksAdapter(deps, () => NOW),
    soap: new EwsTasksAdapter({ soap: executor }),
  });
}

describe('toTaskContent', () => {
  it('should fill defaults for unset fields', () => {
    expect(toTaskContent({ subject: 'Call the bank' })).toEqual({
      subject: 'Call the bank',
      body: '',
      importance: 1,
      complete: false,
    });
  });

  it('should keep only the optional fields that are set', () => {
    const content = toTaskContent({ subject: 'Plan trip', dueDate: DUE, categories: ['Home'] });

    expect(content).toEqual({
      subject: 'Plan trip',
      body: '',
      importance: 1,
      complete: false,
      dueDate: DUE,
      categories: ['Home'],
    });
    expect('startDate' in content).toBe(false);
  });
});

describe('TasksService', () => {
  let executor: ScriptedExecutor;

  beforeEach(() => {
    executor = new ScriptedExecutor();
  });

  describe('native path', () => {
    let service: TasksService;

    beforeEach(() => {
      service = createService(executor, '14.1');
    });

    it('should create an incomplete task with body and UTC dates', async () => {
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({
          syncKey: '2',
          responses: '<Add><ClientId>x</ClientId><ServerId>7:1</ServerId><Status>1</Status></Add>',
        })
      );

      const result = await service.createTask({
        subject: 'Quarterly review',
        body: 'Agenda',
        dueDate: DUE,
        complete: true,
      });

      expect(result).toEqual({ ok: true, data: '7:1' });
      expect(executor.commands()).toEqual(['FolderSync', 'Sync', 'Sync']);
      const body = executor.bodyOf(2);
      expect(body).toContain('<CollectionId>7</CollectionId>');
      expect(body).toContain('<airsyncbase:Data>Agenda</airsyncbase:Data>');
      expect(body).toContain('<tasks:Complete>0</tasks:Complete>');
      expect(body).toContain(
        '<tasks:DueDate>2024-02-01T00:00:00.000Z</tasks:DueDate>' +
          '<tasks:UtcDueDate>2024-02-01T00:00:00.000Z</tasks:UtcDueDate>'
      );
      expect(body).toContain('<tasks:ReminderSet>0</tasks:ReminderSet>');
    });

    it('should stamp DateCompleted when an update completes the task', async () => {
      executor.reply(folderSyncReply(HIERARCHY), syncReply({ syncKey: '1' }), syncReply({ syncKey: '2' }));

      const result = await service.updateTask('7:1', { subject: 'Quarterly review', complete: true });

      expect(result).toEqual({ ok: true, data: true });
      const body = executor.bodyOf(2);
      expect(body).toContain('<Change><ServerId>7:1</ServerId>');
      expect(body).toContain(
        '<tasks:Complete>1</tasks:Complete><tasks:DateCompleted>2024-01-15T12:00:00.000Z</tasks:DateCompleted>'
      );
    });

    it('should soft delete from Tasks and hard delete from Deleted Items', async () => {
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2' }),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2' })
      );

      expect(await service.deleteTask('7:3')).toEqual({ ok: true, data: true });
      expect(await service.deleteTaskPermanently('4:3')).toEqual({ ok: true, data: true });

      expect(executor.bodyOf(2)).toContain('<CollectionId>7</CollectionId><DeletesAsMoves>1</DeletesAsMoves>');
      expect(executor.bodyOf(4)).toContain('<CollectionId>4</CollectionId><DeletesAsMoves>0</DeletesAsMoves>');
    });

    it('should restore a task from Deleted Items', async () => {
      executor.reply(
        folderSyncReply(HIERARCHY),
        '<MoveItems><Response><SrcMsgId>4:3</SrcMsgId><Status>3</Status>' +
          '<DstMsgId>7:8</DstMsgId></Response></MoveItems>'
      );

      const result = await service.restoreTask('4:3');

      expect(result).toEqual({ ok: true, data: '7:8' });
      expect(executor.bodyOf(1)).toContain('<SrcFldId>4</SrcFldId>');
      expect(executor.bodyOf(1)).toContain('<DstFldId>7</DstFldId>');
    });

    it('should merge tasks with deleted tasks and skip other deleted items', async () => {
      const task =
        '<tasks:Subject>Pay rent</tasks:Subject><tasks:Importance>2</tasks:Importance>' +
        '<tasks:Complete>1</tasks:Complete><tasks:DueDate>2024-02-01T00:00:00.000Z</tasks:DueDate>';
      executor.reply(
        folderSyncReply(HIERARCHY),
        syncReply({ syncKey: '1' }),
        syncReply({ syncKey: '2', commands: addCommand('7:1', task) }),
        syncReply({ syncKey: '1' }),
        syncReply({
          syncKey: '2',
          commands:
            addCommand('4:1', '<tasks:Subject>Old errand</tasks:Subject>') +
            addCommand('4:2', noteData('Scratch', 'text')),
        })
      );

      const result = await service.syncTasks();

      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.data.map((t) => [t.serverId, t.subject, t.isDeleted])).toEqual([
        ['7:1', 'Pay rent', false],
        ['4:1', 'Old errand', true],
      ]);
      expect(result.data[0]).toMatchObject({ importance: 2, complete: true, dueDate: DUE });
    });

    it('should report a missing Tasks folder without sending a Sync', async () => {
      executor.reply(folderSyncReply([['4', FolderType.DELETED_ITEMS, 'Deleted Items']]));

      const result = await service.createTask({ subject: 'Lost' });

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.code).toBe('FOLDER_NOT_FOUND');
      expect(executor.commands()).toEqual(['FolderSync']);
    });
  });

  describe('EWS path', () => {
    let service: TasksService;

    beforeEach(() => {
      service = createService(executor, '12.1');
    });

    it('should create a task without Body when blank', async () => {
      const id = ewsId('T1');
      executor.reply(
        ewsReply('CreateItem', `<m:Items><t:Task><t:ItemId Id="${id}" ChangeKey="CK"/></t:Task></m:Items>`)
      );

      const result = await service.createTask({ subject: 'File taxes', dueDate: DUE });

      expect(result).toEqual({ ok: true, data: id });
      const body = executor.bodyOf(0);
      expect(body).not.toContain('<t:Body');
      expect(body).toContain(
        '<t:Importance>Normal</t:Importance><t:DueDate>2024-02-01T00:00:00.000Z</t:DueDate>'
      );
    });

    it('should clear DueDate and set Completed on update', async () => {
      const id = ewsId('T2');
      executor.reply(
        ewsReply('GetItem', `<m:Items><t:Task><t:ItemId Id="${id}" ChangeKey="CK7"/></t:Task></m:Items>`),
        ewsReply('UpdateItem')
      );

      const result = await service.updateTask(id, { subject: 'File taxes', complete: true });

      expect(result).toEqual({ ok: true, data: true });
      expect(executor.commands()).toEqual(['GetItem', 'UpdateItem']);
      const body = executor.bodyOf(1);
      expect(body).toContain(`<t:ItemId Id="${id}" ChangeKey="CK7"/>`);
      expect(body).toContain('<t:DeleteItemField><t:FieldURI FieldURI="task:DueDate"/></t:DeleteItemField>');
      expect(body).toContain('<t:Status>Completed</t:Status>');
    });

    it('should hard delete an ActiveSync id resolved by position', async () => {
      executor.reply(findItemReply(['d1', 'd2']), ewsReply('DeleteItem'));

      const result = await service.deleteTaskPermanently('4:1');

      expect(result).toEqual({ ok: true, data: true });
      expect(executor.bodyOf(0)).toContain('deleteditems');
      expect(executor.bodyOf(1)).toContain('HardDelete');
      expect(executor.bodyOf(1)).toContain('Id="d1"');
    });

    it('should list tasks and flag the ones in Deleted Items', async () => {
      const item = (id: string, subject: string): string =>
        `<t:Task><t:ItemId Id="${id}"/><t:ItemClass>IPM.Task</t:ItemClass>` +
        `<t:Subject>${subject}</t:Subject><t:Importance>High</t:Importance>` +
        '<t:Status>Completed</t:Status></t:Task>';
      executor.reply(
        findItemReply(['t1']),
        ewsReply('GetItem', `<m:Items>${item('t1', 'Renew passport')}</m:Items>`),
        findItemReply(['d1', 'd2']),
        ewsReply(
          'GetItem',
          `<m:Items>${item('d1', 'Old errand')}<t:Message><t:ItemId Id="d2"/></t:Message></m:Items>`
        )
      );

      const result = await service.syncTasks();

      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.data.map((t) => [t.serverId, t.subject, t.isDeleted])).toEqual([
        ['t1', 'Renew passport', false],
        ['d1', 'Old errand', true],
      ]);
      expect(result.data[0]).toMatchObject({ importance: 2, complete: true });
    });
  });
});
