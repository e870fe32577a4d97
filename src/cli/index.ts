#!/usr/bin/env node

/**
 * CLI entry point for the evidence scoring engine
 */

// Load .env before any module reads the environment
import 'dotenv/config';
import { Command } from 'commander';
import { join } from 'path';
import { resolveCachePath } from '../config/defaults.js';
import { ConsensusRequestSchema, EvidenceRecordListSchema } from '../domain/schemas.js';
import type { ConsensusEstimate, EvidenceRecord, OpportunityScore } from '../domain/types.js';
import { createInstrumentStore, openInstrumentCache } from '../lookup/factory.js';
import { buildConsensus } from '../pipeline/consensus.js';
import { aggregateByDisease } from '../pipeline/diseaseAggregation.js';
import {
  exportResults,
  flattenConsensus,
  flattenDiseaseAggregate,
  flattenMechanismAggregate,
  flattenOpportunityScore,
  printMechanismReport,
  printScoreReport,
  type ExportFormat,
} from '../pipeline/export.js';
import { scoreRecords } from '../pipeline/run.js';
import { rankMechanisms } from '../pipeline/tournament.js';
import { getOutputDir, readJsonFile } from '../utils/io.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('cli');
const program = new Command();

interface ScoringCommandOptions {
  input: string;
  format: string;
  output?: string;
  cache: string;
  llm: boolean;
}

interface ConsensusCommandOptions {
  input: string;
  format: string;
  output?: string;
}

interface CacheCommandOptions {
  cache: string;
}

function parseFormat(format: string): ExportFormat {
  if (format !== 'csv' && format !== 'json') {
    throw new Error(`Invalid format "${format}". Use "csv" or "json"`);
  }
  return format;
}

async function loadRecords(file_path: string): Promise<EvidenceRecord[]> {
  const records = EvidenceRecordListSchema.parse(await readJsonFile(file_path));
  logger.info({ file_path, records: records.length }, 'Loaded evidence records');
  return records;
}

function outputPath(options: { output?: string }, name: string, format: ExportFormat): string {
  return options.output ?? join(getOutputDir(), `${name}.${format}`);
}

/**
 * Shared runner for commands that score records through the instrument store.
 */
async function withScores(
  label: string,
  options: ScoringCommandOptions,
  handle: (scores: OpportunityScore[], format: ExportFormat) => Promise<void>
): Promise<void> {
  const { store, cache } = createInstrumentStore({ cache_path: options.cache, use_llm: options.llm });
  try {
    const format = parseFormat(options.format);
    const records = await loadRecords(options.input);
    const { scores } = await scoreRecords(records, store);
    await handle(scores, format);
  } catch (error) {
    logger.error({ error }, `${label} command failed`);
    console.error(`\n✗ ${label} failed: ${error}\n`);
    process.exit(1);
  } finally {
    cache.close();
  }
}

function addScoringOptions(command: Command): Command {
  return command
    .requiredOption('--input <file>', 'JSON file with an array of evidence records')
    .option('--format <format>', 'Output format: csv or json', 'json')
    .option('--output <file>', 'Output file (default: out/<command>.<format>)')
    .option('--cache <path>', 'SQLite instrument cache path', resolveCachePath())
    .option('--llm', 'Look up unknown diseases with the LLM (requires OPENAI_API_KEY)', false);
}

program
  .name('evidence-score')
  .description('Evidence aggregation and composite opportunity scoring')
  .version('1.0.0');

// Score command
addScoringOptions(
  program.command('score').description('Score each evidence record on clinical, evidence and market dimensions')
).action(async (options: ScoringCommandOptions) => {
  await withScores('Score', options, async (scores, format) => {
    printScoreReport(scores);
    const file_path = outputPath(options, 'scores', format);
    await exportResults(file_path, scores, flattenOpportunityScore, format);
    console.log(`✓ Scores written to ${file_path}\n`);
  });
});

// Rank command
addScoringOptions(
  program.command('rank').description('Rank mechanisms through the gated tournament')
).action(async (options: ScoringCommandOptions) => {
  await withScores('Rank', options, async (scores, format) => {
    const mechanisms = rankMechanisms(scores);
    printMechanismReport(mechanisms);
    const file_path = outputPath(options, 'mechanisms', format);
    await exportResults(file_path, mechanisms, flattenMechanismAggregate, format);
    console.log(`✓ Mechanism ranking written to ${file_path}\n`);
  });
});

// Aggregate command
addScoringOptions(
  program.command('aggregate').description('Pool evidence by disease')
).action(async (options: ScoringCommandOptions) => {
  await withScores('Aggregate', options, async (scores, format) => {
    const diseases = aggregateByDisease(scores);
    for (const d of diseases) {
      console.log(
        `${d.disease}: ${d.study_count} stud${d.study_count === 1 ? 'y' : 'ies'}, N=${d.total_patients}, ` +
          `pooled response ${d.pooled_response_pct ?? 'n/a'}%, confidence ${d.evidence_confidence}`
      );
    }
    const file_path = outputPath(options, 'diseases', format);
    await exportResults(file_path, diseases, flattenDiseaseAggregate, format);
    console.log(`\n✓ Disease rollup written to ${file_path}\n`);
  });
});

// Consensus command
program
  .command('consensus')
  .description('Build consensus estimates from labelled groups of source estimates')
  .requiredOption('--input <file>', 'JSON object mapping label -> array of source estimates')
  .option('--format <format>', 'Output format: csv or json', 'json')
  .option('--output <file>', 'Output file (default: out/consensus.<format>)')
  .action(async (options: ConsensusCommandOptions) => {
    try {
      const format = parseFormat(options.format);
      const groups = ConsensusRequestSchema.parse(await readJsonFile(options.input));

      const results: Array<{ label: string; consensus: ConsensusEstimate }> = [];
      for (const [label, estimates] of Object.entries(groups)) {
        const consensus = buildConsensus(estimates);
        results.push({ label, consensus });
        console.log(
          `${label}: ${consensus.consensus_value} [${consensus.range[0]} - ${consensus.range[1]}] ` +
            `CV ${consensus.coefficient_of_variation.toFixed(2)}, ${consensus.confidence}`
        );
      }

      const file_path = outputPath(options, 'consensus', format);
      await exportResults(file_path, results, (r) => flattenConsensus(r.label, r.consensus), format);
      console.log(`\n✓ Consensus written to ${file_path}\n`);
    } catch (error) {
      logger.error({ error }, 'Consensus command failed');
      console.error(`\n✗ Consensus failed: ${error}\n`);
      process.exit(1);
    }
  });

// Cache stats command
program
  .command('cache-stats')
  .description('Show instrument cache statistics')
  .option('--cache <path>', 'SQLite instrument cache path', resolveCachePath())
  .action((options: CacheCommandOptions) => {
    const cache = openInstrumentCache(options.cache);
    try {
      const stats = cache.stats();
      console.log('\nInstrument Cache Statistics:');
      console.log(`  Total entries: ${stats.total_entries}`);
      console.log(`  Expired entries: ${stats.expired_entries}`);
      console.log('  By source:');
      for (const [source, count] of Object.entries(stats.by_source)) {
        console.log(`    ${source}: ${count}`);
      }
      console.log();
    } catch (error) {
      logger.error({ error }, 'Cache stats command failed');
      console.error(`\n✗ Failed to get cache stats: ${error}\n`);
      process.exit(1);
    } finally {
      cache.close();
    }
  });

// Cache clear command
program
  .command('cache-clear')
  .description('Clear the instrument cache')
  .option('--cache <path>', 'SQLite instrument cache path', resolveCachePath())
  .action((options: CacheCommandOptions) => {
    const cache = openInstrumentCache(options.cache);
    try {
      cache.clear();
      console.log('\n✓ Instrument cache cleared\n');
    } catch (error) {
      logger.error({ error }, 'Cache clear command failed');
      console.error(`\n✗ Failed to clear cache: ${error}\n`);
      process.exit(1);
    } finally {
      cache.close();
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ error }, 'CLI failed');
  process.exit(1);
});
