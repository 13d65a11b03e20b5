/**
 * @exsync/eas-sync - Item Parsers
 *
 * Entity views over Sync ApplicationData and EWS item XML.
 */

import { NOTE_MESSAGE_CLASS } from './request-builder';
import { unescapeXml } from './xml-escape';
import {
  extractAttribute,
  extractBlock,
  extractBlocks,
  extractContact,
  extractEmail,
  extractEws,
  extractInt,
  extractNote,
  extractTask,
  extractValue,
} from './xml-extractor';

import type {
  Contact,
  MailChange,
  MailItem,
  Note,
  RawSyncItem,
  Task,
  TaskImportance,
} from '../interfaces/types';

export const UNTITLED_NOTE = 'No subject';

// =============================================================================
// Shared Helpers
// =============================================================================

/**
 * Milliseconds since epoch for an EAS or EWS timestamp, 0 when blank or
 * unparseable. Values without a zone designator are read as UTC.
 */
export function parseEasDate(value: string | null): number {
  if (!value) {
    return 0;
  }
  const trimmed = value.trim();
  const dateOnly = /^\d{4}-\d{2}-\d{2}$/.test(trimmed);
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed);
  const normalized = dateOnly || hasZone ? trimmed : `${trimmed}Z`;
  const parsed = Date.parse(normalized);
  return isNaN(parsed) ? 0 : parsed;
}

function toImportance(value: string | null): TaskImportance {
  if (value === '0') {
    return 0;
  }
  return value === '2' ? 2 : 1;
}

function categories(data: string, prefix: string): string[] {
  const block = extractBlock(data, `${prefix}:Categories`);
  if (block === null) {
    return [];
  }
  return extractBlocks(block, `${prefix}:Category`).map((category) => unescapeXml(category.trim()));
}

/**
 * Plain-text body from airsyncbase:Body/Data, falling back to an inline
 * `<prefix>:Body` for 2.5-era payloads
 */
function syncBody(data: string, prefix: string): string {
  const body = extractBlock(data, 'airsyncbase:Body');
  const content = body !== null ? extractValue(body, 'Data') : extractValue(data, `${prefix}:Body`);
  return unescapeXml(content ?? '');
}

/**
 * A blank class counts as a note; some servers drop MessageClass on notes
 */
export function isNoteMessageClass(messageClass: string | null): boolean {
  return !messageClass || messageClass.toLowerCase().includes('stickynote');
}

// =============================================================================
// Notes
// =============================================================================

export function parseNote(item: RawSyncItem): Note | null {
  const data = item.applicationData;
  const subject = unescapeXml(extractNote(data, 'Subject') ?? '');
  const body = syncBody(data, 'notes');

  if (!subject && !body) {
    return null;
  }

  return {
    serverId: item.serverId,
    subject: subject || UNTITLED_NOTE,
    body,
    messageClass: extractNote(data, 'MessageClass') ?? NOTE_MESSAGE_CLASS,
    categories: categories(data, 'notes'),
    lastModified: parseEasDate(extractNote(data, 'LastModifiedDate')),
    isDeleted: false,
  };
}

/**
 * Sticky notes among EWS FindItem or GetItem results
 */
export function parseEwsNotes(xml: string): Note[] {
  const notes: Note[] = [];

  for (const itemXml of [...extractBlocks(xml, 't:Message'), ...extractBlocks(xml, 't:PostItem')]) {
    const serverId = extractAttribute(itemXml, 'ItemId', 'Id');
    const itemClass = extractEws(itemXml, 'ItemClass') ?? '';
    if (serverId === null || !isNoteMessageClass(itemClass)) {
      continue;
    }

    notes.push({
      serverId,
      subject: unescapeXml(extractEws(itemXml, 'Subject') ?? '') || UNTITLED_NOTE,
      body: unescapeXml(extractEws(itemXml, 'Body') ?? ''),
      messageClass: itemClass || NOTE_MESSAGE_CLASS,
      categories: extractBlocks(extractEws(itemXml, 'Categories') ?? '', 't:String').map(unescapeXml),
      lastModified: parseEasDate(extractEws(itemXml, 'LastModifiedTime')),
      isDeleted: false,
    });
  }

  return notes;
}

// =============================================================================
// Tasks
// =============================================================================

export function parseTask(item: RawSyncItem): Task {
  const data = item.applicationData;
  const date = (tag: string, utcTag?: string): number =>
    parseEasDate(extractTask(data, tag) ?? (utcTag ? extractTask(data, utcTag) : null));

  return {
    serverId: item.serverId,
    subject: unescapeXml(extractTask(data, 'Subject') ?? ''),
    body: syncBody(data, 'tasks'),
    startDate: date('StartDate', 'UtcStartDate'),
    dueDate: date('DueDate', 'UtcDueDate'),
    complete: extractTask(data, 'Complete') === '1',
    dateCompleted: date('DateCompleted'),
    importance: toImportance(extractTask(data, 'Importance')),
    reminderSet: extractTask(data, 'ReminderSet') === '1',
    reminderTime: date('ReminderTime'),
    categories: categories(data, 'tasks'),
    isDeleted: false,
  };
}

const EWS_IMPORTANCE: Record<string, TaskImportance> = {
  Low: 0,
  Normal: 1,
  High: 2,
};

/**
 * Task items among EWS FindItem or GetItem results. Items of another
 * class (deleted mail sharing the folder) are skipped.
 */
export function parseEwsTasks(xml: string): Task[] {
  const tasks: Task[] = [];

  for (const itemXml of extractBlocks(xml, 't:Task')) {
    const serverId = extractAttribute(itemXml, 'ItemId', 'Id');
    const itemClass = extractEws(itemXml, 'ItemClass') ?? '';
    if (serverId === null || (itemClass && !itemClass.toLowerCase().includes('task'))) {
      continue;
    }

    tasks.push({
      serverId,
      subject: unescapeXml(extractEws(itemXml, 'Subject') ?? ''),
      body: unescapeXml(extractEws(itemXml, 'Body') ?? ''),
      startDate: parseEasDate(extractEws(itemXml, 'StartDate')),
      dueDate: parseEasDate(extractEws(itemXml, 'DueDate')),
      complete: extractEws(itemXml, 'Status') === 'Completed',
      dateCompleted: parseEasDate(extractEws(itemXml, 'CompleteDate')),
      importance: EWS_IMPORTANCE[extractEws(itemXml, 'Importance') ?? ''] ?? 1,
      reminderSet: extractEws(itemXml, 'ReminderIsSet') === 'true',
      reminderTime: parseEasDate(extractEws(itemXml, 'ReminderDueBy')),
      categories: [],
      isDeleted: false,
    });
  }

  return tasks;
}

// =============================================================================
// Mail
// =============================================================================

const FLAG_STATUS_ACTIVE = 2;

export function parseMailItem(item: RawSyncItem): MailItem {
  const data = item.applicationData;
  const field = (tag: string): string => unescapeXml(extractEmail(data, tag) ?? '');
  const flag = extractBlock(data, 'email:Flag');

  return {
    serverId: item.serverId,
    subject: field('Subject'),
    from: field('From'),
    to: field('To'),
    cc: field('Cc'),
    dateReceived: extractEmail(data, 'DateReceived') ?? '',
    read: extractEmail(data, 'Read') === '1',
    flagged: flag !== null && extractInt(flag, 'Status') === FLAG_STATUS_ACTIVE,
    importance: Number(extractEmail(data, 'Importance') ?? '1'),
    body: syncBody(data, 'email'),
    messageClass: extractEmail(data, 'MessageClass') ?? 'IPM.Note',
  };
}

/**
 * Change entries for mail usually carry only the Read and Flag elements
 */
export function parseMailChange(item: RawSyncItem): MailChange {
  const data = item.applicationData;
  const read = extractEmail(data, 'Read');
  const flag = extractBlock(data, 'email:Flag');

  return {
    serverId: item.serverId,
    read: read === null ? null : read === '1',
    flagged: flag === null ? null : extractInt(flag, 'Status') === FLAG_STATUS_ACTIVE,
  };
}

// =============================================================================
// Contacts
// =============================================================================

/** `"Ana Lima" <ana@example.com>` to `ana@example.com` */
function bareAddress(value: string): string {
  const angled = /<([^<>]+)>\s*$/.exec(value);
  return (angled?.[1] ?? value).trim();
}

/**
 * Contact from Contacts and Contacts2 fields. Entries with neither a name
 * nor an address are distribution lists or placeholders; they parse to
 * null.
 */
export function parseContact(item: RawSyncItem): Contact | null {
  const data = item.applicationData;
  const field = (tag: string): string => unescapeXml(extractContact(data, tag) ?? '');
  const address = (tag: string): string => bareAddress(field(tag));

  const firstName = field('FirstName');
  const middleName = field('MiddleName');
  const lastName = field('LastName');
  const email = address('Email1Address');
  const fullName = [firstName, middleName, lastName].filter(Boolean).join(' ');
  const displayName = field('FileAs') || fullName || email;

  if (!displayName) {
    return null;
  }

  return {
    serverId: item.serverId,
    displayName,
    firstName,
    middleName,
    lastName,
    email,
    email2: address('Email2Address'),
    email3: address('Email3Address'),
    company: field('CompanyName'),
    department: field('Department'),
    jobTitle: field('JobTitle'),
    officeLocation: field('OfficeLocation'),
    businessPhone: field('BusinessPhoneNumber'),
    homePhone: field('HomePhoneNumber'),
    mobilePhone: field('MobilePhoneNumber'),
    webPage: field('WebPage'),
    nickName: field('NickName'),
    categories: categories(data, 'contacts'),
  };
}
