/**
 * Core types for section-ranker-mcp
 */

// ============================================
// DOCUMENT INPUT
// ============================================

export interface PageText {
  /** 1-based page number in the source document */
  page_number: number;
  text: string;
}

export type DocumentKind = 'pdf' | 'text';

export interface ExtractedDocument {
  name: string;
  kind: DocumentKind;
  pages: PageText[];
  page_count: number;
  warnings: string[];
}

// ============================================
// PIPELINE VALUES
// ============================================

export interface ContentUnit {
  document: string;
  page_number: number;
  text: string;
  /** Position of the paragraph within its page, starting at 0 */
  paragraph_index: number;
}

export type KeywordSet = ReadonlySet<string>;

export interface ScoredUnit extends ContentUnit {
  score: number;
}

export interface RankedUnit extends ScoredUnit {
  section_title: string;
  importance_rank: number;
}

export interface RankOptions {
  top_n: number;
  title_max_length: number;
}

// ============================================
// OUTPUT TYPES
// ============================================

export interface ResultMetadata {
  input_document: string;
  persona: string;
  job_to_be_done: string;
  processing_timestamp: string;
}

export interface RankedSection {
  document: string;
  page_number: number;
  section_title: string;
  importance_rank: number;
}

export interface SectionExcerpt {
  document: string;
  page_number: number;
  refined_text: string;
}

export interface ResultSet {
  metadata: ResultMetadata;
  extracted_sections: RankedSection[];
  sub_section_analysis: SectionExcerpt[];
}

// ============================================
// BATCH
// ============================================

export interface ProcessedDocument {
  document: string;
  output_path: string;
  sections: number;
}

export interface DocumentFailure {
  document: string;
  code: string;
  message: string;
}

export interface BatchReport {
  processed: ProcessedDocument[];
  failures: DocumentFailure[];
}

// ============================================
// CONFIGURATION
// ============================================

export interface Config {
  inputDir: string;
  outputDir: string;
  personaDescription: string;
  jobToBeDone: string;
  topN: number;
  titleMaxLength: number;
  stopwordsLanguage: string;
  lexiconDir?: string;
  inputExtensions: string[];
  maxBytes: number;
  pdfEnabled: boolean;
  resultTtlS: number;
}
