/**
 * @exsync/eas-sync - SOAP Builder
 *
 * EWS request bodies. `buildEnvelope` wraps any of the command builders
 * below with the header matching the server generation.
 */

import { escapeXml } from './xml-escape';
import { NOTE_MESSAGE_CLASS, formatEasDate } from './request-builder';

import type { EwsDeleteType, EwsGeneration, EwsItemId, TaskImportance } from '../interfaces/types';

// =============================================================================
// Envelope
// =============================================================================

const SOAP_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const TYPES_NS = 'http://schemas.microsoft.com/exchange/services/2006/types';
const MESSAGES_NS = 'http://schemas.microsoft.com/exchange/services/2006/messages';

const SERVER_VERSION: Record<EwsGeneration, string> = {
  legacy: 'Exchange2007_SP1',
  modern: 'Exchange2010',
};

export function buildEnvelope(body: string, generation: EwsGeneration): string {
  return (
    '<?xml version="1.0" encoding="utf-8"?>' +
    `<soap:Envelope xmlns:soap="${SOAP_NS}" xmlns:t="${TYPES_NS}" xmlns:m="${MESSAGES_NS}">` +
    `<soap:Header><t:RequestServerVersion Version="${SERVER_VERSION[generation]}"/></soap:Header>` +
    `<soap:Body>${body}</soap:Body>` +
    '</soap:Envelope>'
  );
}

// =============================================================================
// Helpers
// =============================================================================

function text(name: string, value: string): string {
  return `<${name}>${escapeXml(value)}</${name}>`;
}

function textBody(body: string): string {
  return `<t:Body BodyType="Text">${escapeXml(body)}</t:Body>`;
}

function itemIdElement(itemId: EwsItemId): string {
  const changeKey = itemId.changeKey ? ` ChangeKey="${escapeXml(itemId.changeKey)}"` : '';
  return `<t:ItemId Id="${escapeXml(itemId.id)}"${changeKey}/>`;
}

function distinguishedFolder(folderId: string): string {
  return `<t:DistinguishedFolderId Id="${escapeXml(folderId)}"/>`;
}

function setItemField(fieldUri: string, itemElement: string, content: string): string {
  return (
    '<t:SetItemField>' +
    `<t:FieldURI FieldURI="${fieldUri}"/>` +
    `<${itemElement}>${content}</${itemElement}>` +
    '</t:SetItemField>'
  );
}

function deleteItemField(fieldUri: string): string {
  return `<t:DeleteItemField><t:FieldURI FieldURI="${fieldUri}"/></t:DeleteItemField>`;
}

const IMPORTANCE_NAMES: Record<TaskImportance, string> = {
  0: 'Low',
  1: 'Normal',
  2: 'High',
};

// =============================================================================
// Generic Item Commands
// =============================================================================

export type BaseShape = 'IdOnly' | 'Default' | 'AllProperties';

export function buildFindItem(
  distinguishedFolderId: string,
  options: { maxEntries?: number; baseShape?: BaseShape } = {}
): string {
  return (
    '<m:FindItem Traversal="Shallow">' +
    `<m:ItemShape><t:BaseShape>${options.baseShape ?? 'AllProperties'}</t:BaseShape></m:ItemShape>` +
    `<m:IndexedPageItemView MaxEntriesReturned="${options.maxEntries ?? 1000}" Offset="0" BasePoint="Beginning"/>` +
    `<m:ParentFolderIds>${distinguishedFolder(distinguishedFolderId)}</m:ParentFolderIds>` +
    '</m:FindItem>'
  );
}

/**
 * Fetch full items, with bodies as plain text
 */
export function buildGetItem(itemIds: readonly string[]): string {
  const ids = itemIds.map((id) => itemIdElement({ id, changeKey: null })).join('');
  return (
    '<m:GetItem>' +
    '<m:ItemShape><t:BaseShape>AllProperties</t:BaseShape><t:BodyType>Text</t:BodyType></m:ItemShape>' +
    `<m:ItemIds>${ids}</m:ItemIds>` +
    '</m:GetItem>'
  );
}

export function buildDeleteItem(itemId: string, deleteType: EwsDeleteType): string {
  return (
    `<m:DeleteItem DeleteType="${deleteType}">` +
    `<m:ItemIds>${itemIdElement({ id: itemId, changeKey: null })}</m:ItemIds>` +
    '</m:DeleteItem>'
  );
}

export function buildMoveItem(itemId: string, distinguishedFolderId: string): string {
  return (
    '<m:MoveItem>' +
    `<m:ToFolderId>${distinguishedFolder(distinguishedFolderId)}</m:ToFolderId>` +
    `<m:ItemIds>${itemIdElement({ id: itemId, changeKey: null })}</m:ItemIds>` +
    '</m:MoveItem>'
  );
}

// =============================================================================
// Notes
// =============================================================================

export function buildCreateNoteItem(subject: string, body: string): string {
  return (
    '<m:CreateItem MessageDisposition="SaveOnly">' +
    `<m:SavedItemFolderId>${distinguishedFolder('notes')}</m:SavedItemFolderId>` +
    '<m:Items><t:Message>' +
    text('t:ItemClass', NOTE_MESSAGE_CLASS) +
    text('t:Subject', subject) +
    textBody(body) +
    '</t:Message></m:Items>' +
    '</m:CreateItem>'
  );
}

export function buildUpdateNoteItem(itemId: EwsItemId, subject: string, body: string): string {
  return (
    '<m:UpdateItem MessageDisposition="SaveOnly" ConflictResolution="AlwaysOverwrite">' +
    '<m:ItemChanges><t:ItemChange>' +
    itemIdElement(itemId) +
    '<t:Updates>' +
    setItemField('item:Subject', 't:Message', text('t:Subject', subject)) +
    setItemField('item:Body', 't:Message', textBody(body)) +
    '</t:Updates>' +
    '</t:ItemChange></m:ItemChanges>' +
    '</m:UpdateItem>'
  );
}

// =============================================================================
// Tasks
// =============================================================================

export interface EwsTaskContent {
  subject: string;
  body: string;
  importance: TaskImportance;
  dueDate?: number;
  complete?: boolean;
}

/**
 * Task creation. Body is left out when blank and DueDate when absent;
 * element order follows the EWS schema (item fields before task fields).
 * Exchange 2007 rejects MessageDisposition on task items.
 */
export function buildCreateTaskItem(task: EwsTaskContent): string {
  const body = task.body.trim() ? textBody(task.body) : '';
  const dueDate =
    task.dueDate !== undefined && task.dueDate > 0 ? text('t:DueDate', formatEasDate(task.dueDate)) : '';

  return (
    '<m:CreateItem>' +
    `<m:SavedItemFolderId>${distinguishedFolder('tasks')}</m:SavedItemFolderId>` +
    '<m:Items><t:Task>' +
    text('t:Subject', task.subject) +
    body +
    text('t:Importance', IMPORTANCE_NAMES[task.importance]) +
    dueDate +
    text('t:Status', 'NotStarted') +
    '</t:Task></m:Items>' +
    '</m:CreateItem>'
  );
}

export function buildUpdateTaskItem(itemId: EwsItemId, task: EwsTaskContent): string {
  const dueDate =
    task.dueDate !== undefined && task.dueDate > 0
      ? setItemField('task:DueDate', 't:Task', text('t:DueDate', formatEasDate(task.dueDate)))
      : deleteItemField('task:DueDate');

  return (
    '<m:UpdateItem ConflictResolution="AlwaysOverwrite">' +
    '<m:ItemChanges><t:ItemChange>' +
    itemIdElement(itemId) +
    '<t:Updates>' +
    setItemField('item:Subject', 't:Task', text('t:Subject', task.subject)) +
    setItemField('item:Body', 't:Task', textBody(task.body)) +
    setItemField('item:Importance', 't:Task', text('t:Importance', IMPORTANCE_NAMES[task.importance])) +
    dueDate +
    setItemField('task:Status', 't:Task', text('t:Status', task.complete ? 'Completed' : 'NotStarted')) +
    '</t:Updates>' +
    '</t:ItemChange></m:ItemChanges>' +
    '</m:UpdateItem>'
  );
}
