/**
 * Batch runner
 *
 * Applies one persona and job to every document in the input directory.
 * A failing document is reported and skipped; only an unreadable input
 * directory stops the batch.
 */

import * as fs from 'node:fs/promises';

import type { BatchReport, Config } from '../types.js';
import type { LexicalResource } from '../lexicon/resource.js';
import { AnalysisError, describeError } from '../errors.js';
import { extractDocument, type DocumentTextProvider } from '../extractors/index.js';
import { buildKeywordSet } from '../processing/keywords.js';
import { analyzeDocument } from '../processing/pipeline.js';
import { discoverDocuments } from './discovery.js';
import { outputFileName, type ResultSink } from './json-sink.js';

export type BatchLogger = Pick<Console, 'log' | 'error'>;

export interface BatchOptions {
  config: Config;
  lexicon: LexicalResource;
  providers: readonly DocumentTextProvider[];
  sink: ResultSink;
  now?: () => Date;
  logger?: BatchLogger;
}

export async function runBatch(options: BatchOptions): Promise<BatchReport> {
  const { config, lexicon, providers, sink, now, logger = console } = options;
  const report: BatchReport = { processed: [], failures: [] };

  const documents = await discoverDocuments(config.inputDir, config.inputExtensions);
  if (documents.length === 0) {
    logger.log(`No documents found in '${config.inputDir}'.`);
    return report;
  }

  // Same persona and job for every document
  const keywords = buildKeywordSet(config.personaDescription, config.jobToBeDone, lexicon);
  if (keywords.size === 0) {
    logger.log('Persona and job yield no keywords; every document will have empty results.');
  }

  // Output name -> document that wrote it; report.md and report.txt both map to report.json
  const claimedOutputs = new Map<string, string>();

  for (const document of documents) {
    logger.log(`Processing '${document.name}'...`);

    try {
      const outputName = outputFileName(document.name);
      const owner = claimedOutputs.get(outputName);
      if (owner !== undefined) {
        throw new AnalysisError(
          'SINK_FAILED',
          `Output '${outputName}' was already written for '${owner}'`,
          document.name
        );
      }

      let bytes: Buffer;
      try {
        bytes = await fs.readFile(document.path);
      } catch (err) {
        throw new AnalysisError('EXTRACTION_FAILED', `Cannot read ${document.path}`, document.name, { cause: err });
      }

      const extracted = await extractDocument(document.name, bytes, providers, config);
      for (const warning of extracted.warnings) {
        logger.log(`   '${document.name}': ${warning}`);
      }

      const result = analyzeDocument(
        {
          document: document.name,
          pages: extracted.pages,
          persona: config.personaDescription,
          job: config.jobToBeDone,
        },
        {
          lexicon,
          keywords,
          rank: { top_n: config.topN, title_max_length: config.titleMaxLength },
          now,
        }
      );

      const outputPath = await sink.write(document.name, result);
      claimedOutputs.set(outputName, document.name);
      report.processed.push({
        document: document.name,
        output_path: outputPath,
        sections: result.extracted_sections.length,
      });
      logger.log(`-> Successfully generated '${outputPath}'`);
    } catch (err) {
      const { code, message } = describeError(err, 'PROCESSING_FAILED');
      report.failures.push({ document: document.name, code, message });
      logger.error(`!! Failed to process '${document.name}' [${code}]: ${message}`);
    }
  }

  return report;
}
