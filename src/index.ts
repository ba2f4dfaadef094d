#!/usr/bin/env node

import { EntityStore } from './database/entity-store.js';
import { auctionClient } from './scraper/auction-client.js';
import { HarvestOrchestrator } from './scraper/harvest-orchestrator.js';
import { InvalidArgumentError, type ParsedArgs, parseHarvestArgs, USAGE } from './utils/cli-args.js';
import { config } from './utils/config.js';
import { formatSlashDate } from './utils/dates.js';
import { logger } from './utils/logger.js';

/**
 * Harvest auction price tables into the JSON store
 *
 * Usage:
 *   npm run harvest                                        # today, auctions 1..10
 *   npm run harvest -- --lastdate 15/03/2024 --maxdays 7   # a week back from 15/03
 *   npm run harvest -- --maxauctions=25
 */
async function main(): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseHarvestArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      console.error(`Error: ${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  if (parsed.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const { options } = parsed;
  console.log('=== Auction price harvest ===\n');
  console.log('Configuration:');
  console.log(`  Last date: ${formatSlashDate(options.lastDate)}`);
  console.log(`  Days: ${options.maxDays}`);
  console.log(`  Auctions: 1..${options.maxAuctions}`);
  console.log(`  Data dir: ${config.harvest.dataDir}`);
  console.log('');

  const store = new EntityStore(config.harvest.dataDir);
  const orchestrator = new HarvestOrchestrator({ store, source: auctionClient });
  const stats = await orchestrator.run(options);

  console.log('=== Results ===\n');
  console.log(`  Requests: ${stats.queried}`);
  console.log(`  Pages recorded: ${stats.recordedPages}`);
  console.log(`  Pages without rows: ${stats.emptyPages}`);
  console.log(`  Invalid responses: ${stats.invalidResponses}`);
  console.log(`  Failed requests: ${stats.failedRequests}`);
  console.log(`  New prices: ${stats.insertedPrices}`);
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error('Harvest failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
