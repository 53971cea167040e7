#!/usr/bin/env node
/**
 * likewise CLI entry point
 */

import { Command } from 'commander';
import { VERSION } from '../index.js';
import { registerSimilarCommand } from './commands/similar.js';
import { registerUpdateSimilaritiesCommand } from './commands/update-similarities.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('likewise')
    .description('Similar-document retrieval over a Solr search backend')
    .version(VERSION);

  registerSimilarCommand(program);
  registerUpdateSimilaritiesCommand(program);

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

void main();
