#!/usr/bin/env node
import { getConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { CliUsageError } from './errors/index.js';
import { parseArgs, USAGE, CliArgs } from './cli/args.js';
import { loadContacts } from './services/contactSource.js';
import { initializeCampaignServices } from './services/index.js';

process.on('unhandledRejection', (reason: unknown) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  const stack = reason instanceof Error ? reason.stack : undefined;
  logger.fatal({ reason: message, stack }, 'Unhandled promise rejection - exiting');
  process.exit(1);
});

async function run(args: CliArgs): Promise<void> {
  const config = getConfig();
  const contactsPath = args.contactsPath ?? config.campaign.contactsPath;

  const { contacts, errors } = await loadContacts(contactsPath);
  for (const rowError of errors) {
    console.error(`Skipping contacts row ${rowError.line}: ${rowError.reason}`);
  }

  const { dispatcher } = await initializeCampaignServices(config, {
    simulate: args.simulate,
    only: args.only,
    ratePerMinute: args.ratePerMinute,
    statePath: args.statePath,
  });

  const summary = await dispatcher.run(contacts);

  if (summary.replied > 0) {
    console.log(`Stopped follow-ups for ${summary.replied} contact(s) who replied.`);
  }
  if (summary.failed > 0) {
    console.log(`${summary.failed} message(s) failed and will be retried next run.`);
  }
  console.log(`Done. Sent ${summary.sent} messages.`);
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }

  try {
    await run(args);
  } catch (err) {
    logger.fatal({ err }, 'Campaign run aborted');
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start campaign run');
  process.exit(1);
});
