/**
 * Output formatting for CLI
 *
 * Provides human-readable and JSON output formatters for CLI commands.
 * Command output goes to stdout; logs and progress go to stderr.
 */

import chalk from 'chalk';
import type { BulkRunResult } from '../batch/bulk-updater.js';
import type { DetailedRetrieval } from '../similarity/service.js';
import type { Candidate, DocumentRef } from '../similarity/types.js';

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
  /** Include retrieval diagnostics */
  explain?: boolean;
}

/**
 * Candidate as printed in JSON output
 */
export interface CandidateDisplay {
  rank: number;
  type: string;
  id: number;
  typeLabel: string;
  title: string;
  url: string;
  score: number;
  lexicalScore?: number;
  vectorScore?: number;
  origin: string;
  snippet: string;
}

export function toCandidateDisplay(candidate: Candidate, index: number): CandidateDisplay {
  const display: CandidateDisplay = {
    rank: index + 1,
    type: candidate.documentRef.type,
    id: candidate.documentRef.id,
    typeLabel: candidate.typeLabel,
    title: candidate.title,
    url: candidate.url,
    score: candidate.score,
    origin: candidate.algorithmOrigin,
    snippet: candidate.snippet,
  };
  if (candidate.subscores.lexicalScore !== undefined) {
    display.lexicalScore = candidate.subscores.lexicalScore;
  }
  if (candidate.subscores.vectorScore !== undefined) {
    display.vectorScore = candidate.subscores.vectorScore;
  }
  return display;
}

/**
 * Format a score for display: up to three decimals, no trailing zeros
 */
export function formatScore(score: number): string {
  return String(Number(score.toFixed(3)));
}

/**
 * Lines describing how a retrieval ran
 */
export function formatDiagnostics(retrieval: DetailedRetrieval): string[] {
  const { diagnostics } = retrieval;
  const lines = [
    `Path: ${diagnostics.path}`,
    `Partition: root ${String(diagnostics.partition.rootContainerId)}, language ${String(diagnostics.partition.languageId)}`,
    `Backend: ${diagnostics.backend ?? 'none'}`,
  ];
  for (const sub of diagnostics.subQueries) {
    const status =
      sub.error === undefined
        ? `${String(sub.candidates)} candidate(s)`
        : `failed (${sub.error.code}): ${sub.error.message}`;
    lines.push(`  ${sub.algorithm}: ${status}`);
  }
  lines.push(`Duration: ${String(diagnostics.durationMs)}ms`);
  return lines;
}

/**
 * Format similar documents for output
 */
export function formatSimilarResults(
  source: DocumentRef,
  retrieval: DetailedRetrieval,
  options: OutputOptions
): void {
  const results = retrieval.results.map(toCandidateDisplay);

  if (options.json === true) {
    const output: Record<string, unknown> = {
      source: { type: source.type, id: source.id },
      results,
    };
    if (options.explain === true) {
      output.diagnostics = retrieval.diagnostics;
    }
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  if (options.explain === true) {
    for (const line of formatDiagnostics(retrieval)) {
      console.log(chalk.dim(line));
    }
    console.log('');
  }

  if (results.length === 0) {
    console.log('No similar documents found.');
    return;
  }

  console.log(`Found ${String(results.length)} similar document(s) for ${source.type}:${String(source.id)}:\n`);

  for (const result of results) {
    console.log(
      `${chalk.bold(`${String(result.rank)}.`)} ${chalk.cyan(result.title || '(untitled)')} ` +
        chalk.dim(`[${result.typeLabel} ${String(result.id)}] ${formatScore(result.score)} ${result.origin}`)
    );
    if (result.url !== '') {
      console.log(`   ${result.url}`);
    }
    if (result.snippet !== '') {
      console.log(`   ${result.snippet}`);
    }
    console.log('');
  }
}

/**
 * Format the summary of a bulk run
 */
export function formatBulkResult(result: BulkRunResult, options: OutputOptions): void {
  if (options.json === true) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log('\nSimilarity update complete:');
  for (const site of result.perSite) {
    const errors = site.errors > 0 ? chalk.red(`${String(site.errors)} error(s)`) : '0 errors';
    console.log(`  ${site.site} (root ${String(site.rootContainerId)}): ${String(site.updated)} updated, ${errors}`);
  }
  console.log(`  Total: ${chalk.green(String(result.updated))} updated, ${String(result.errors)} error(s)`);
}
