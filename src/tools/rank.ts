/**
 * Rank Tool
 *
 * Ranks the sections of one document against a persona and a job.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

import type { Config, PageText, RankOptions, ResultSet } from '../types.js';
import type { LexicalResource } from '../lexicon/resource.js';
import { describeError } from '../errors.js';
import { extractDocument, type DocumentTextProvider } from '../extractors/index.js';
import { analyzeDocument } from '../processing/pipeline.js';
import { storeResult } from '../resources/store.js';
import { generateResultId } from '../utils/hash.js';
import {
  isRecord,
  optionalPositiveInteger,
  optionalRecord,
  requireRecord,
  requireString,
  requireText,
  type ToolInputSchema,
} from './arguments.js';

/** Page text already extracted by the caller, or the raw file to extract */
export type RankDocumentInput =
  | { name: string; pages: PageText[] }
  | { name: string; raw_bytes: Buffer };

export interface RankToolInput {
  document: RankDocumentInput;
  persona: string;
  job: string;
  options?: Partial<RankOptions>;
}

export interface RankToolOutput {
  success: boolean;
  result_id?: string;
  result?: ResultSet;
  warnings?: string[];
  error?: {
    code: string;
    message: string;
  };
}

export interface RankToolDeps {
  config: Config;
  lexicon: LexicalResource;
  providers: readonly DocumentTextProvider[];
  now?: () => Date;
}

/**
 * Validate raw MCP arguments for the rank tool
 */
export function parseRankArguments(args: unknown): RankToolInput {
  const argsObject = requireRecord(args, 'arguments');
  const document = requireRecord(argsObject['document'], 'document');
  const options = optionalRecord(argsObject['options'], 'options');

  const name = requireString(document['name'], 'document.name');
  const pagesValue = document['pages'];
  const rawBytesValue = document['raw_bytes'];

  if ((pagesValue === undefined) === (rawBytesValue === undefined)) {
    throw new McpError(
      ErrorCode.InvalidParams,
      'Exactly one of document.pages or document.raw_bytes must be provided'
    );
  }

  let rankDocument: RankDocumentInput;
  if (pagesValue !== undefined) {
    rankDocument = { name, pages: parsePages(pagesValue) };
  } else {
    if (typeof rawBytesValue !== 'string') {
      throw new McpError(ErrorCode.InvalidParams, 'document.raw_bytes must be a base64 string');
    }
    rankDocument = { name, raw_bytes: Buffer.from(rawBytesValue, 'base64') };
  }

  return {
    document: rankDocument,
    persona: requireText(argsObject['persona'], 'persona'),
    job: requireText(argsObject['job'], 'job'),
    options: {
      top_n: optionalPositiveInteger(options?.['top_n'], 'options.top_n'),
      title_max_length: optionalPositiveInteger(options?.['title_max_length'], 'options.title_max_length'),
    },
  };
}

function parsePages(value: unknown): PageText[] {
  if (!Array.isArray(value)) {
    throw new McpError(ErrorCode.InvalidParams, 'document.pages must be an array');
  }

  return value.map((page: unknown, idx) => {
    if (!isRecord(page)) {
      throw new McpError(ErrorCode.InvalidParams, `document.pages[${idx}] must be an object`);
    }
    const pageNumber = page['page_number'];
    if (typeof pageNumber !== 'number' || !Number.isInteger(pageNumber) || pageNumber < 1) {
      throw new McpError(
        ErrorCode.InvalidParams,
        `document.pages[${idx}].page_number must be a positive integer`
      );
    }
    return {
      page_number: pageNumber,
      text: requireText(page['text'], `document.pages[${idx}].text`),
    };
  });
}

/**
 * Execute the rank tool
 */
export async function executeRank(input: RankToolInput, deps: RankToolDeps): Promise<RankToolOutput> {
  const { document, persona, job, options = {} } = input;
  const { config, lexicon, providers, now = () => new Date() } = deps;

  try {
    let pages: PageText[];
    let warnings: string[] = [];

    if ('pages' in document) {
      pages = document.pages;
    } else {
      const extracted = await extractDocument(document.name, document.raw_bytes, providers, config);
      pages = extracted.pages;
      warnings = extracted.warnings;
    }

    const result = analyzeDocument(
      { document: document.name, pages, persona, job },
      {
        lexicon,
        rank: {
          top_n: options.top_n ?? config.topN,
          title_max_length: options.title_max_length ?? config.titleMaxLength,
        },
        now,
      }
    );

    const resultId = generateResultId(
      document.name,
      persona,
      job,
      result.metadata.processing_timestamp
    );
    storeResult({
      result_id: resultId,
      result,
      stored_at: result.metadata.processing_timestamp,
    });

    return {
      success: true,
      result_id: resultId,
      result,
      warnings,
    };

  } catch (err) {
    return {
      success: false,
      error: describeError(err, 'RANK_ERROR'),
    };
  }
}

/**
 * Get JSON schema for rank tool input
 */
export function getRankInputSchema(): ToolInputSchema {
  return {
    type: 'object',
    properties: {
      document: {
        type: 'object',
        description: 'The document to rank: either extracted page text or the raw file',
        properties: {
          name: {
            type: 'string',
            description: 'Document file name, e.g. report.pdf',
          },
          pages: {
            type: 'array',
            description: 'Per-page text, page numbers starting at 1',
            items: {
              type: 'object',
              properties: {
                page_number: { type: 'integer', minimum: 1 },
                text: { type: 'string' },
              },
              required: ['page_number', 'text'],
            },
          },
          raw_bytes: {
            type: 'string',
            description: 'Base64-encoded PDF or text file',
          },
        },
        required: ['name'],
      },
      persona: {
        type: 'string',
        description: 'Who is reading, e.g. "climate scientist"',
      },
      job: {
        type: 'string',
        description: 'What the reader needs to get done',
      },
      options: {
        type: 'object',
        properties: {
          top_n: {
            type: 'integer',
            description: 'Maximum number of sections to return',
            minimum: 1,
          },
          title_max_length: {
            type: 'integer',
            description: 'Maximum section title length before truncation',
            minimum: 1,
          },
        },
      },
    },
    required: ['document', 'persona', 'job'],
  };
}
