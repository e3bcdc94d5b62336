/**
 * Document analysis pipeline
 *
 * Segment -> extract keywords -> score -> rank -> assemble, for a single
 * document. Synchronous and free of shared state; only the lexical
 * resource is shared, read-only.
 */

import type { KeywordSet, PageText, RankOptions, ResultSet } from '../types.js';
import type { LexicalResource } from '../lexicon/resource.js';
import { segmentDocument } from './segmenter.js';
import { buildKeywordSet } from './keywords.js';
import { scoreUnits } from './scorer.js';
import { rankUnits } from './ranker.js';
import { assembleResult } from './assembler.js';

export interface AnalyzeInput {
  document: string;
  pages: readonly PageText[];
  persona: string;
  job: string;
}

export interface AnalyzeDeps {
  lexicon: LexicalResource;
  rank?: Partial<RankOptions>;
  /** Precomputed keywords, for batches that share one persona and job */
  keywords?: KeywordSet;
  now?: () => Date;
}

export function analyzeDocument(input: AnalyzeInput, deps: AnalyzeDeps): ResultSet {
  const { lexicon, rank = {}, now = () => new Date() } = deps;

  const units = segmentDocument(input.document, input.pages);
  const keywords = deps.keywords ?? buildKeywordSet(input.persona, input.job, lexicon);
  const ranked = rankUnits(scoreUnits(units, keywords, lexicon), rank);

  return assembleResult(
    {
      input_document: input.document,
      persona: input.persona,
      job_to_be_done: input.job,
      processing_timestamp: now().toISOString(),
    },
    ranked
  );
}
