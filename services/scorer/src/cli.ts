#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import {
  describeError,
  formatCountScoringConfig,
  formatFacetScoringConfig,
  loadCountScoringConfig,
  loadFacetScoringConfig,
} from '@gsr-scoring/core';
import { SUPPORTED_CATEGORIES } from './scorers/index.js';
import { runScore } from './commands/index.js';

const program = new Command();

program
  .name('gsr-score')
  .description('Score forecast warnings against GSR events')
  .version('1.0.0');

// Score command
program
  .command('score')
  .description('Match warnings to GSR events for one category and location, and print the scores')
  .requiredOption('-c, --category <category>', `Event category (${SUPPORTED_CATEGORIES.join(', ')})`)
  .requiredOption('-l, --location <location>', 'Location preset or country to score')
  .requiredOption('-w, --warnings <file>', 'JSON file with an array of warning records')
  .requiredOption('-g, --gsr <file>', 'JSON file with an array of GSR event records')
  .option('--pretty', 'Pretty-print the JSON report', false)
  .action((opts: { category: string; location: string; warnings: string; gsr: string; pretty: boolean }) => {
    try {
      runScore(opts);
    } catch (error) {
      console.error(`[cli] Scoring failed: ${describeError(error)}`);
      process.exit(1);
    }
  });

// Config command
program
  .command('config')
  .description('Print the effective scoring configuration')
  .action(() => {
    console.log(formatFacetScoringConfig(loadFacetScoringConfig()));
    console.log(formatCountScoringConfig(loadCountScoringConfig()));
  });

program.parse();
