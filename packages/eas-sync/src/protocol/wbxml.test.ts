/**
 * Tests for the WBXML Codec
 */

import {
  buildFolderCreate,
  buildFolderSync,
  buildMailReadChange,
  buildMoveItems,
  buildNoteCreate,
  buildProvisionRequest,
  buildSearchGal,
  buildSearchMailbox,
  buildSyncDelete,
  buildSyncInitial,
  buildSyncWithBody,
  buildTaskUpdate,
} from './request-builder';
import { parseMoveItems } from './response-parsers';
import { WBXML_CONTENT_TYPE, codePageFor, decodeWbxml, encodeWbxml, isWbxml } from './wbxml';

const HEADER = [0x03, 0x01, 0x6a, 0x00];

/** STR_I with its terminator */
const inline = (text: string): number[] => [0x03, ...Buffer.from(text, 'utf8'), 0x00];

const wbxml = (...tokens: number[]): Buffer => Buffer.from([...HEADER, ...tokens]);

describe('WBXML codec', () => {
  describe('encodeWbxml', () => {
    it('should encode a Sync request on the AirSync page', () => {
      expect([...encodeWbxml(buildSyncInitial('7'))]).toEqual([
        ...HEADER,
        0x45, // Sync
        0x5c, // Collections
        0x4f, // Collection
        0x4b, ...inline('0'), 0x01, // SyncKey
        0x52, ...inline('7'), 0x01, // CollectionId
        0x01,
        0x01,
        0x01,
      ]);
    });

    it('should switch to the page of a prefixed element', () => {
      const bytes = [...encodeWbxml(buildMailReadChange('5', '2', '2:1', true))];

      const applicationData = bytes.indexOf(0x5d);
      expect(bytes.slice(applicationData, applicationData + 9)).toEqual([
        0x5d, // ApplicationData
        0x00, 0x02, // Email page
        0x55, ...inline('1'), 0x01, // Read
        0x01,
      ]);
    });

    it('should leave the content flag off empty elements', () => {
      const bytes = encodeWbxml('<Sync xmlns="AirSync"><MoreAvailable/><Commands></Commands></Sync>');

      expect([...bytes]).toEqual([...HEADER, 0x45, 0x14, 0x16, 0x01]);
    });

    it('should send escaped text as raw UTF-8', () => {
      const bytes = encodeWbxml(
        '<FolderSync xmlns="FolderHierarchy"><SyncKey>a &amp; é</SyncKey></FolderSync>'
      );

      expect([...bytes]).toEqual([...HEADER, 0x00, 0x07, 0x56, 0x52, ...inline('a & é'), 0x01, 0x01]);
    });

    it('should reject an element outside the code pages', () => {
      expect(() => encodeWbxml('<Sync xmlns="AirSync"><Bogus>1</Bogus></Sync>')).toThrow(
        expect.objectContaining({
          code: 'MALFORMED_REQUEST',
          message: 'WBXML encoding failed: <Bogus> is not on code page AirSync',
        })
      );
    });

    it('should reject an undeclared prefix', () => {
      expect(() => encodeWbxml('<Sync xmlns="AirSync"><x:Read>1</x:Read></Sync>')).toThrow(
        'WBXML encoding failed: <x:Read> has no namespace'
      );
    });
  });

  describe('decodeWbxml', () => {
    it('should decode a Sync reply with prefixed item fields', () => {
      const data = wbxml(
        0x45,
        0x5c,
        0x4f,
        0x4b, ...inline('5'), 0x01,
        0x52, ...inline('2'), 0x01,
        0x4e, ...inline('1'), 0x01,
        0x14,
        0x56,
        0x47,
        0x4d, ...inline('2:1'), 0x01,
        0x5d,
        0x00, 0x02,
        0x54, ...inline('A & B'), 0x01,
        0x01, 0x01, 0x01, 0x01, 0x01, 0x01
      );

      expect(decodeWbxml(data)).toBe(
        '<?xml version="1.0" encoding="utf-8"?>' +
          '<Sync xmlns="AirSync" xmlns:email="Email"><Collections><Collection>' +
          '<SyncKey>5</SyncKey><CollectionId>2</CollectionId><Status>1</Status><MoreAvailable/>' +
          '<Commands><Add><ServerId>2:1</ServerId><ApplicationData>' +
          '<email:Subject>A &amp; B</email:Subject>' +
          '</ApplicationData></Add></Commands></Collection></Collections></Sync>'
      );
    });

    it('should read opaque data and string table references', () => {
      const table = Buffer.from('5:9\0', 'utf8');
      const data = Buffer.from([
        0x03, 0x01, 0x6a, table.length, ...table,
        0x00, 0x05,
        0x45, // MoveItems
        0x4a, // Response
        0x47, 0xc3, 0x03, ...Buffer.from('2:1'), 0x01, // SrcMsgId
        0x4b, ...inline('3'), 0x01, // Status
        0x4c, 0x83, 0x00, 0x01, // DstMsgId
        0x01,
        0x01,
      ]);

      expect(parseMoveItems(decodeWbxml(data))).toEqual([{ srcMsgId: '2:1', status: 3, dstMsgId: '5:9' }]);
    });

    it('should fail on truncated data', () => {
      expect(() => decodeWbxml(wbxml(0x45, 0x4b, 0x03, 0x31))).toThrow(
        expect.objectContaining({
          code: 'MALFORMED_RESPONSE',
          message: 'WBXML decoding failed: unterminated inline string',
        })
      );
    });

    it('should fail on an element left open', () => {
      expect(() => decodeWbxml(wbxml(0x45, 0x5c, 0x01))).toThrow('WBXML decoding failed: <Sync> is not closed');
    });

    it('should fail on a tag missing from its code page', () => {
      expect(() => decodeWbxml(wbxml(0x00, 0x05, 0x7f))).toThrow(
        'WBXML decoding failed: unknown tag 0x3f on page 5'
      );
    });

    it('should return the encoder input after a round trip', () => {
      const xml = buildFolderSync('0');

      expect(decodeWbxml(encodeWbxml(xml))).toBe(
        '<?xml version="1.0" encoding="utf-8"?><FolderSync xmlns="FolderHierarchy"><SyncKey>0</SyncKey></FolderSync>'
      );
    });
  });

  it('should carry every request document through unchanged', () => {
    const documents = [
      buildSyncWithBody('3', '7', { windowSize: 25 }),
      buildSyncDelete('3', '7', '7:1', true),
      buildNoteCreate('3', '10', 'c1', { subject: 'Fish & chips', body: 'Line 1\nLine 2', categories: ['Home'] }),
      buildTaskUpdate(
        '3',
        '9',
        '9:1',
        { subject: 'Report', body: 'Draft', importance: 2, complete: true, dueDate: Date.UTC(2024, 1, 1) },
        { modern: true, completedAt: Date.UTC(2024, 0, 15) }
      ),
      buildFolderCreate('1', '0', 'Archive', 12),
      buildMoveItems([{ serverId: '2:1', srcFolderId: '2' }], '5'),
      buildSearchGal('ana', 10),
      buildSearchMailbox('report', { collectionId: '2' }),
      buildProvisionRequest({ model: 'Model', friendlyName: 'Phone', os: 'OS 1', userAgent: 'Agent/1' }),
    ];
    const withoutDeclarations = (xml: string): string =>
      xml.replace(/^<\?xml[^>]*\?>/, '').replace(/ xmlns(?::\w+)?="[^"]*"/g, '');

    for (const xml of documents) {
      expect(withoutDeclarations(decodeWbxml(encodeWbxml(xml)))).toBe(withoutDeclarations(xml));
    }
  });

  describe('isWbxml', () => {
    it('should trust the content type or the version byte', () => {
      expect(isWbxml(WBXML_CONTENT_TYPE, Buffer.from('<Sync/>'))).toBe(true);
      expect(isWbxml(null, wbxml(0x45, 0x01))).toBe(true);
      expect(isWbxml('text/html', Buffer.from('<html/>'))).toBe(false);
      expect(isWbxml(null, Buffer.alloc(0))).toBe(false);
    });
  });

  it('should match namespaces without regard to case', () => {
    expect(codePageFor('Gal')?.page).toBe(16);
    expect(codePageFor('Notes')?.prefix).toBe('notes');
    expect(codePageFor('Calendar')).toBeNull();
  });
});
