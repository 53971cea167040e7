/**
 * CLI command: update-similarities
 *
 * Precompute and store similar documents for every document of the
 * configured sites.
 */

import type { Command } from 'commander';
import { BulkUpdater } from '../../batch/bulk-updater.js';
import type { SiteConfig } from '../../config/schema.js';
import { mergeSettings } from '../../similarity/settings.js';
import { withContext } from '../context.js';
import { AgentErrors, CLIError, ExitCode, handleError } from '../errors.js';
import { formatBulkResult } from '../output.js';
import { createProgressDisplay } from '../progress.js';
import { collectPair, modeSettings, parseIntegerFlag, parseSetPairs } from '../settings-args.js';

/**
 * Modes accepted by the bulk command
 */
const BULK_MODES = ['lexical', 'mlt', 'hybrid', 'smlt'];

interface UpdateOptions {
  site?: string;
  language?: string;
  mode?: string;
  delay?: string;
  set: string[];
  json?: boolean;
  verbose?: boolean;
  config?: string;
}

/**
 * Sites selected by `--site` (identifier or root id), all when absent
 */
export function selectSites(sites: readonly SiteConfig[], selector: string | undefined): SiteConfig[] {
  if (sites.length === 0) {
    throw CLIError.withAgentInfo(AgentErrors.noSites(), ExitCode.NOT_FOUND);
  }
  if (selector === undefined) {
    return [...sites];
  }
  const selected = sites.filter(
    (site) => site.identifier === selector || String(site.rootContainerId) === selector
  );
  if (selected.length === 0) {
    throw CLIError.withAgentInfo(
      AgentErrors.siteNotFound(
        selector,
        sites.map((site) => site.identifier)
      ),
      ExitCode.NOT_FOUND
    );
  }
  return selected;
}

async function executeUpdate(options: UpdateOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const languageId = parseIntegerFlag(options.language, '--language', 0);
    const settings = mergeSettings(
      parseSetPairs(options.set),
      modeSettings(options.mode ?? 'lexical', BULK_MODES)
    );

    const result = await withContext(
      async (context) => {
        const { config, logger } = context;
        if (context.tree.size === 0) {
          throw CLIError.withAgentInfo(AgentErrors.contentTreeMissing(), ExitCode.INVALID_ARGS);
        }

        const sites = selectSites(config.sites, options.site).filter((site) => {
          if (site.cores[String(languageId)] !== undefined) return true;
          logger.warn(
            { site: site.identifier, languageId },
            'Site has no core for this language, skipping'
          );
          return false;
        });

        const store = context.store;
        if (store === null) {
          throw new CLIError('Similarity store is not open');
        }

        const updater = new BulkUpdater(context.service, store, context.tree, {
          excludedKinds: config.bulk.excludedKinds,
          delayMs: parseIntegerFlag(options.delay, '--delay', config.bulk.delayMs),
          logger,
        });

        const progress = createProgressDisplay({ json: isJson, verbose: options.verbose === true });
        try {
          return await updater.run({
            sites,
            languageId,
            settings,
            onProgress: progress.createCallback(),
          });
        } finally {
          progress.finish();
        }
      },
      {
        ...(options.config === undefined ? {} : { configPath: options.config }),
        openStore: true,
        verbose: options.verbose === true,
      }
    );

    formatBulkResult(result, { json: isJson });

    if (result.errors > 0) {
      process.exit(ExitCode.GENERAL_ERROR);
    }
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the update-similarities command with the program
 */
export function registerUpdateSimilaritiesCommand(program: Command): void {
  program
    .command('update-similarities')
    .description('Precompute similar documents for every document of the configured sites')
    .option('--site <site>', 'Only this site (identifier or root id)')
    .option('-l, --language <id>', 'Language id (default: 0)')
    .option('-m, --mode <mode>', 'lexical, mlt, hybrid or smlt (default: lexical)')
    .option('--delay <ms>', 'Pause between documents in milliseconds')
    .option('-s, --set <key=value>', 'Override a similarity setting (repeatable)', collectPair, [])
    .option('-c, --config <path>', 'Configuration file')
    .option('-v, --verbose', 'One progress line per document, debug logging')
    .option('--json', 'Output in JSON format')
    .action(async (options: UpdateOptions) => {
      await executeUpdate(options);
    });
}
