/**
 * Configuration management for section-ranker-mcp
 */

import type { Config } from './types.js';

export const DEFAULT_PERSONA = 'Default persona: a general researcher';
export const DEFAULT_JOB = 'Default job: find the most relevant sections';

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringArray(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value.trim() === '') return defaultValue;
  return value.split(',').map(s => s.trim().toLowerCase()).filter(s => s.length > 0);
}

export function loadConfig(): Config {
  const lexiconDir = process.env['LEXICON_DIR']?.trim();

  return {
    inputDir: process.env['INPUT_DIR'] ?? './input',
    outputDir: process.env['OUTPUT_DIR'] ?? './output',
    // Empty strings are legitimate here: they yield an empty keyword set
    personaDescription: process.env['PERSONA_DESCRIPTION'] ?? DEFAULT_PERSONA,
    jobToBeDone: process.env['JOB_TO_BE_DONE'] ?? DEFAULT_JOB,
    topN: parseNumber(process.env['TOP_N'], 10),
    titleMaxLength: parseNumber(process.env['TITLE_MAX_LENGTH'], 100),
    stopwordsLanguage: process.env['STOPWORDS_LANGUAGE']?.trim() || 'english',
    lexiconDir: lexiconDir || undefined,
    inputExtensions: parseStringArray(process.env['INPUT_EXTENSIONS'], ['.pdf', '.txt', '.md']),
    maxBytes: parseNumber(process.env['MAX_BYTES'], 50 * 1024 * 1024), // 50MB
    pdfEnabled: parseBoolean(process.env['PDF_ENABLED'], true),
    resultTtlS: parseNumber(process.env['RESULT_TTL_S'], 3600),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

// Validate configuration
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.inputDir.trim() === '') {
    errors.push('INPUT_DIR must not be empty');
  }
  if (config.outputDir.trim() === '') {
    errors.push('OUTPUT_DIR must not be empty');
  }
  if (config.topN < 1 || config.topN > 100) {
    errors.push('TOP_N must be between 1 and 100');
  }
  if (config.titleMaxLength < 10 || config.titleMaxLength > 1000) {
    errors.push('TITLE_MAX_LENGTH must be between 10 and 1000');
  }
  if (!/^[a-z_]+$/.test(config.stopwordsLanguage)) {
    errors.push('STOPWORDS_LANGUAGE must contain only lowercase letters and underscores');
  }
  if (config.inputExtensions.length === 0) {
    errors.push('INPUT_EXTENSIONS must list at least one extension');
  }
  for (const ext of config.inputExtensions) {
    if (!ext.startsWith('.') || ext.length < 2) {
      errors.push(`INPUT_EXTENSIONS entry "${ext}" must start with a dot`);
    }
  }
  if (config.maxBytes < 1024) {
    errors.push('MAX_BYTES must be at least 1024 bytes');
  }
  if (config.maxBytes > 500 * 1024 * 1024) {
    errors.push('MAX_BYTES must be at most 500MB');
  }
  if (config.resultTtlS < 0) {
    errors.push('RESULT_TTL_S must be at least 0');
  }

  return errors;
}
