#!/usr/bin/env node

/**
 * CLI for checking an Exchange ActiveSync account
 *
 * Usage (after `npm run build` at the repository root):
 *   node dist/packages/eas-sync/cli/eas-sync.js detect
 *   node dist/packages/eas-sync/cli/eas-sync.js folders
 *   node dist/packages/eas-sync/cli/eas-sync.js notes --deleted
 *   node dist/packages/eas-sync/cli/eas-sync.js contacts
 *   node dist/packages/eas-sync/cli/eas-sync.js search "quarterly report" --gal --limit 20
 *
 * Environment variables required:
 *   EAS_SERVER_URL - Server origin, e.g. https://mail.example.com
 *   EAS_USERNAME - Account user name
 *   EAS_PASSWORD - Account password
 */

import { Command } from 'commander';

import { EasClient } from '../src/client/eas-client';
import { loadConnectionConfig, validateEnvironment } from '../src/config';

import type { EasResult } from '../src/interfaces/result';

function connect(): EasClient {
  const missing = validateEnvironment();
  if (missing.length > 0) {
    console.error(`❌ Error: missing environment variables: ${missing.join(', ')}`);
    process.exit(1);
  }
  return new EasClient(loadConnectionConfig());
}

/**
 * Print the error and exit when `result` failed
 */
function unwrap<T>(result: EasResult<T>): T {
  if (!result.ok) {
    console.error(`❌ ${result.error.category}/${result.error.code}: ${result.error.message}`);
    process.exit(1);
  }
  return result.data;
}

function preview(text: string, length: number = 60): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > length ? `${flat.substring(0, length)}...` : flat;
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('eas-sync')
    .description('Check an Exchange ActiveSync server and inspect an account')
    .version('1.0.0');

  program
    .command('detect')
    .description('Detect the protocol version and the path entity operations take')
    .action(async () => {
      const client = connect();
      const strategy = unwrap(await client.connect());
      console.log(`Protocol version: ${strategy.version}`);
      console.log(`Notes and tasks:  ${strategy.major >= 14 ? 'ActiveSync' : 'EWS'}`);
      client.disconnect();
    });

  program
    .command('folders')
    .description('List the folder hierarchy')
    .action(async () => {
      const client = connect();
      const hierarchy = unwrap(await client.folders.folderSync());
      for (const folder of hierarchy.added) {
        const type = String(folder.type).padStart(2);
        console.log(`${folder.serverId.padEnd(12)} type ${type}  ${folder.displayName}`);
      }
      console.log(`\n${hierarchy.added.length} folders`);
      client.disconnect();
    });

  program
    .command('notes')
    .description('Download all notes')
    .option('-d, --deleted', 'Include notes in Deleted Items')
    .action(async (options: { deleted?: boolean }) => {
      const client = connect();
      const notes = unwrap(await client.notes.syncNotes()).filter(
        (note) => options.deleted === true || !note.isDeleted
      );
      notes.forEach((note, index) => {
        const marker = note.isDeleted ? ' [deleted]' : '';
        console.log(`\n${index + 1}. ${note.subject}${marker}`);
        console.log(`   ${preview(note.body)}`);
      });
      console.log(`\n${notes.length} notes`);
      client.disconnect();
    });

  program
    .command('contacts')
    .description('Download the Contacts folder')
    .action(async () => {
      const client = connect();
      const contacts = unwrap(await client.contacts.syncContacts());
      for (const contact of contacts) {
        const email = contact.email ? ` <${contact.email}>` : '';
        console.log(`${contact.displayName}${email}  ${contact.mobilePhone || contact.businessPhone}`);
      }
      console.log(`\n${contacts.length} contacts`);
      client.disconnect();
    });

  program
    .command('search')
    .description('Search the mailbox or the Global Address List')
    .argument('<query>', 'Search text')
    .option('-g, --gal', 'Search the Global Address List instead of mail')
    .option('-l, --limit <number>', 'Maximum number of results', '25')
    .action(async (query: string, options: { gal?: boolean; limit: string }) => {
      const client = connect();
      const limit = parseInt(options.limit, 10) || 25;

      if (options.gal === true) {
        const contacts = unwrap(await client.search.searchGal(query, limit));
        for (const contact of contacts) {
          console.log(`${contact.displayName} <${contact.email}>  ${contact.company}`);
        }
        console.log(`\n${contacts.length} contacts`);
      } else {
        const hits = unwrap(await client.search.searchMailbox(query, { maxResults: limit }));
        for (const hit of hits) {
          console.log(`${hit.dateReceived}  ${preview(hit.from, 30).padEnd(30)}  ${hit.subject}`);
        }
        console.log(`\n${hits.length} messages`);
      }
      client.disconnect();
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('❌ Unexpected error:', error);
  process.exit(1);
});
