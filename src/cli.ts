#!/usr/bin/env node

/**
 * section-ranker-batch
 *
 * Ranks the sections of every document in INPUT_DIR against the persona
 * and job from the environment, writing one JSON record per document to
 * OUTPUT_DIR.
 */

import 'dotenv/config';

import { loadConfig, validateConfig } from './config.js';
import { loadLexicalResource } from './lexicon/resource.js';
import { createDefaultProviders } from './extractors/index.js';
import { JsonResultSink } from './batch/json-sink.js';
import { runBatch } from './batch/runner.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    console.error('Configuration errors:');
    configErrors.forEach(err => console.error(`  - ${err}`));
    process.exit(1);
  }

  // Without the lexical resource no document can be processed
  const lexicon = await loadLexicalResource({
    language: config.stopwordsLanguage,
    dataDir: config.lexiconDir,
  });

  console.log(`Using Persona: '${config.personaDescription}'`);
  console.log(`Using Job To Be Done: '${config.jobToBeDone}'`);

  const report = await runBatch({
    config,
    lexicon,
    providers: createDefaultProviders(config),
    sink: new JsonResultSink(config.outputDir),
  });

  console.log(
    `\nAll files processed: ${report.processed.length} succeeded, ${report.failures.length} failed.`
  );
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
