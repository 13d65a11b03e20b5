/**
 * Tests for the Response Parsers
 */

import { EasError } from '../interfaces/errors';
import {
  extractEwsError,
  extractEwsItemId,
  extractEwsItemIds,
  folderStatusError,
  isEwsItemNotFound,
  isEwsSuccess,
  parseFolderCommand,
  parseFolderSync,
  parseGalResults,
  parseMailboxSearch,
  parseMoveItems,
  parseProvision,
  parseSyncResponse,
  parseSyncResponses,
  syncStatusError,
} from './response-parsers';

describe('Response Parsers', () => {
  describe('parseFolderSync', () => {
    it('should read the hierarchy from Add entries', () => {
      const xml =
        '<FolderSync><Status>1</Status><SyncKey>1</SyncKey><Changes><Count>2</Count>' +
        '<Add><ServerId>2</ServerId><ParentId>0</ParentId><DisplayName>Inbox</DisplayName><Type>2</Type></Add>' +
        '<Add><ServerId>9</ServerId><ParentId>2</ParentId><DisplayName>R&amp;D</DisplayName><Type>12</Type></Add>' +
        '<Delete><ServerId>4</ServerId></Delete>' +
        '</Changes></FolderSync>';

      expect(parseFolderSync(xml)).toEqual({
        status: 1,
        syncKey: '1',
        added: [
          { serverId: '2', displayName: 'Inbox', parentId: '0', type: 2 },
          { serverId: '9', displayName: 'R&D', parentId: '2', type: 12 },
        ],
        updated: [],
        deleted: ['4'],
      });
    });

    it('should accept bare Folder elements', () => {
      const xml =
        '<FolderSync><Status>1</Status><SyncKey>3</SyncKey>' +
        '<Folder><ServerId>10</ServerId><DisplayName>Notes</DisplayName><Type>10</Type></Folder>' +
        '</FolderSync>';

      expect(parseFolderSync(xml).added).toEqual([
        { serverId: '10', displayName: 'Notes', parentId: '0', type: 10 },
      ]);
    });

    it('should throw MISSING_FIELD without a status', () => {
      expect(() => parseFolderSync('<FolderSync/>')).toThrow(EasError);
    });
  });

  describe('parseFolderCommand', () => {
    it('should read status, key and server id', () => {
      expect(
        parseFolderCommand(
          '<FolderCreate><Status>1</Status><SyncKey>5</SyncKey><ServerId>33</ServerId></FolderCreate>',
          'FolderCreate'
        )
      ).toEqual({ status: 1, syncKey: '5', serverId: '33' });
    });
  });

  describe('parseSyncResponse', () => {
    it('should read commands without picking up responses', () => {
      const xml =
        '<Sync><Collections><Collection>' +
        '<SyncKey>12</SyncKey><CollectionId>5</CollectionId><Status>1</Status>' +
        '<Commands>' +
        '<Add><ServerId>5:1</ServerId><ApplicationData><notes:Subject>A</notes:Subject></ApplicationData></Add>' +
        '<Change><ServerId>5:2</ServerId><ApplicationData><notes:Subject>B</notes:Subject></ApplicationData></Change>' +
        '<Delete><ServerId>5:3</ServerId></Delete>' +
        '<SoftDelete><ServerId>5:4</ServerId></SoftDelete>' +
        '</Commands>' +
        '<Responses><Add><ClientId>c1</ClientId><ServerId>5:9</ServerId><Status>1</Status></Add></Responses>' +
        '</Collection></Collections></Sync>';

      expect(parseSyncResponse(xml)).toEqual({
        status: 1,
        syncKey: '12',
        moreAvailable: false,
        added: [{ serverId: '5:1', applicationData: '<notes:Subject>A</notes:Subject>' }],
        changed: [{ serverId: '5:2', applicationData: '<notes:Subject>B</notes:Subject>' }],
        deleted: ['5:3', '5:4'],
      });
    });

    it('should flag MoreAvailable', () => {
      const xml =
        '<Sync><Collections><Collection><SyncKey>2</SyncKey><Status>1</Status><MoreAvailable/>' +
        '</Collection></Collections></Sync>';
      expect(parseSyncResponse(xml).moreAvailable).toBe(true);
    });

    it('should fall back to a top-level status', () => {
      const result = parseSyncResponse('<Sync><Status>3</Status></Sync>');
      expect(result.status).toBe(3);
      expect(result.syncKey).toBeNull();
      expect(result.added).toEqual([]);
    });
  });

  describe('parseSyncResponses', () => {
    it('should list per-item outcomes', () => {
      const xml =
        '<Collection><Status>1</Status><Responses>' +
        '<Add><ClientId>c1</ClientId><ServerId>5:9</ServerId><Status>1</Status></Add>' +
        '<Change><ServerId>5:2</ServerId><Status>8</Status></Change>' +
        '</Responses></Collection>';

      expect(parseSyncResponses(xml)).toEqual([
        { kind: 'Add', serverId: '5:9', clientId: 'c1', status: 1 },
        { kind: 'Change', serverId: '5:2', clientId: null, status: 8 },
      ]);
    });

    it('should return an empty list without Responses', () => {
      expect(parseSyncResponses('<Collection><Status>1</Status></Collection>')).toEqual([]);
    });
  });

  describe('status errors', () => {
    it('should map sync statuses to codes', () => {
      expect(syncStatusError(3, 'Sync').code).toBe('INVALID_SYNC_KEY');
      expect(syncStatusError(8, 'Sync').code).toBe('ITEM_NOT_FOUND');
      expect(syncStatusError(9, 'Sync').code).toBe('SIZE_EXCEEDED');
      expect(syncStatusError(12, 'Sync').code).toBe('FOLDER_NOT_FOUND');
      expect(syncStatusError(4, 'Sync').code).toBe('STATUS_ERROR');
      expect(syncStatusError(99, 'Note create').message).toBe(
        'Note create failed: Unexpected status (Status 99)'
      );
    });

    it('should map folder statuses to codes', () => {
      expect(folderStatusError(4, 'FolderDelete').code).toBe('FOLDER_NOT_FOUND');
      expect(folderStatusError(9, 'FolderCreate').code).toBe('INVALID_SYNC_KEY');
      expect(folderStatusError(2, 'FolderCreate').message).toBe(
        'FolderCreate failed: A folder with that name already exists (Status 2)'
      );
    });
  });

  describe('parseMoveItems', () => {
    it('should read each response', () => {
      const xml =
        '<MoveItems>' +
        '<Response><SrcMsgId>5:1</SrcMsgId><Status>3</Status><DstMsgId>7:1</DstMsgId></Response>' +
        '<Response><SrcMsgId>5:2</SrcMsgId><Status>1</Status></Response>' +
        '</MoveItems>';

      expect(parseMoveItems(xml)).toEqual([
        { srcMsgId: '5:1', dstMsgId: '7:1', status: 3 },
        { srcMsgId: '5:2', dstMsgId: null, status: 1 },
      ]);
    });
  });

  describe('search', () => {
    it('should read GAL contacts', () => {
      const xml =
        '<Search><Status>1</Status><Response><Store><Status>1</Status>' +
        '<Result><Properties>' +
        '<gal:DisplayName>Jane Roe</gal:DisplayName><gal:EmailAddress>jane@example.com</gal:EmailAddress>' +
        '<gal:Company>Example &amp; Co</gal:Company><gal:Office>Sales</gal:Office>' +
        '</Properties></Result>' +
        '<Result><Properties></Properties></Result>' +
        '</Store></Response></Search>';

      expect(parseGalResults(xml)).toEqual([
        {
          displayName: 'Jane Roe',
          email: 'jane@example.com',
          firstName: '',
          lastName: '',
          company: 'Example & Co',
          department: 'Sales',
          jobTitle: '',
          phone: '',
          mobilePhone: '',
          alias: '',
        },
      ]);
    });

    it('should return no contacts on a failed search', () => {
      expect(parseGalResults('<Search><Status>3</Status></Search>')).toEqual([]);
    });

    it('should read mailbox hits', () => {
      const xml =
        '<Search><Status>1</Status><Response><Store><Status>1</Status>' +
        '<Result><LongId>RgAAAA</LongId><CollectionId>5</CollectionId><Properties>' +
        '<email:Subject>Budget</email:Subject><email:From>a@example.com</email:From>' +
        '<email:DateReceived>2024-01-02T03:04:05.000Z</email:DateReceived>' +
        '<airsyncbase:Body><airsyncbase:Type>1</airsyncbase:Type><airsyncbase:Data>Totals</airsyncbase:Data></airsyncbase:Body>' +
        '</Properties></Result>' +
        '</Store></Response></Search>';

      expect(parseMailboxSearch(xml)).toEqual([
        {
          serverId: 'RgAAAA',
          collectionId: '5',
          subject: 'Budget',
          from: 'a@example.com',
          dateReceived: '2024-01-02T03:04:05.000Z',
          preview: 'Totals',
        },
      ]);
    });
  });

  describe('parseProvision', () => {
    it('should read the policy key and status', () => {
      const xml =
        '<Provision><Status>1</Status><Policies><Policy>' +
        '<PolicyType>MS-EAS-Provisioning-WBXML</PolicyType><Status>1</Status><PolicyKey>998877</PolicyKey>' +
        '</Policy></Policies></Provision>';

      expect(parseProvision(xml)).toEqual({ status: 1, policyKey: '998877', policyStatus: 1 });
    });
  });

  describe('EWS', () => {
    const success =
      '<m:CreateItemResponseMessage ResponseClass="Success"><m:ResponseCode>NoError</m:ResponseCode>' +
      '<m:Items><t:Message><t:ItemId Id="AAMk1" ChangeKey="CQ1"/></t:Message></m:Items>' +
      '</m:CreateItemResponseMessage>';

    it('should require both the class and the code', () => {
      expect(isEwsSuccess(success)).toBe(true);
      expect(
        isEwsSuccess('<m:X ResponseClass="Success"><m:ResponseCode>ErrorAccessDenied</m:ResponseCode></m:X>')
      ).toBe(false);
    });

    it('should detect a missing item', () => {
      const xml =
        '<m:X ResponseClass="Error"><m:MessageText>Gone</m:MessageText>' +
        '<m:ResponseCode>ErrorItemNotFound</m:ResponseCode></m:X>';
      expect(isEwsItemNotFound(xml)).toBe(true);
      expect(extractEwsError(xml)).toBe('Gone');
    });

    it('should extract item ids', () => {
      expect(extractEwsItemId(success)).toEqual({ id: 'AAMk1', changeKey: 'CQ1' });
      expect(extractEwsItemId('<m:Items/>')).toBeNull();
      expect(extractEwsItemIds('<t:ItemId Id="a"/><t:ItemId Id="b" ChangeKey="c"/>')).toEqual(['a', 'b']);
    });
  });
});
