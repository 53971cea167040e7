/**
 * CLI command: similar
 *
 * Retrieve documents similar to one document.
 */

import type { Command } from 'commander';
import { mergeSettings } from '../../similarity/settings.js';
import { createDocumentRef, type DocumentRef } from '../../similarity/types.js';
import { withContext } from '../context.js';
import { handleError, InvalidArgumentError } from '../errors.js';
import { formatSimilarResults } from '../output.js';
import { collectPair, modeSettings, parseIntegerFlag, parseSetPairs } from '../settings-args.js';

/**
 * Similar command options
 */
interface SimilarOptions {
  language?: string;
  mode?: string;
  limit?: string;
  set: string[];
  explain?: boolean;
  json?: boolean;
  verbose?: boolean;
  config?: string;
}

function parseDocumentRef(type: string, idArg: string): DocumentRef {
  const id = parseIntegerFlag(idArg, '<id>', 0, 1);
  try {
    return createDocumentRef(type, id);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Execute the similar command
 */
async function executeSimilar(type: string, idArg: string, options: SimilarOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const ref = parseDocumentRef(type, idArg);
    const languageId = parseIntegerFlag(options.language, '--language', 0);

    const requestSettings = mergeSettings(
      parseSetPairs(options.set),
      modeSettings(options.mode),
      options.limit === undefined
        ? {}
        : { maxResults: parseIntegerFlag(options.limit, '--limit', 6, 1) }
    );

    const retrieval = await withContext(
      (context) => context.service.findSimilarDetailed(ref, requestSettings, languageId),
      {
        ...(options.config === undefined ? {} : { configPath: options.config }),
        verbose: options.verbose === true,
      }
    );

    formatSimilarResults(ref, retrieval, { json: isJson, explain: options.explain === true });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the similar command with the program
 */
export function registerSimilarCommand(program: Command): void {
  program
    .command('similar')
    .description('Find documents similar to a document')
    .argument('<type>', 'Document type, e.g. pages or tx_news_domain_model_news')
    .argument('<id>', 'Document id')
    .option('-l, --language <id>', 'Language id (default: 0)')
    .option('-m, --mode <mode>', 'auto, lexical, mlt, vector, knn, hybrid or smlt')
    .option('-n, --limit <n>', 'Maximum results')
    .option('-s, --set <key=value>', 'Override a similarity setting (repeatable)', collectPair, [])
    .option('--explain', 'Show how the retrieval ran')
    .option('-c, --config <path>', 'Configuration file')
    .option('-v, --verbose', 'Debug logging')
    .option('--json', 'Output in JSON format')
    .action(async (type: string, id: string, options: SimilarOptions) => {
      await executeSimilar(type, id, options);
    });
}
