/**
 * Keywords Tool
 *
 * Shows which terms of a description take part in scoring.
 */

import type { LexicalResource } from '../lexicon/resource.js';
import { extractKeywords } from '../processing/keywords.js';
import type { ToolInputSchema } from './arguments.js';

export interface KeywordsToolOutput {
  success: boolean;
  keywords: string[];
}

export function executeKeywords(input: { text: string }, lexicon: LexicalResource): KeywordsToolOutput {
  return {
    success: true,
    keywords: [...extractKeywords(input.text, lexicon)].sort(),
  };
}

export function getKeywordsInputSchema(): ToolInputSchema {
  return {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Persona or job description to extract keywords from',
      },
    },
    required: ['text'],
  };
}
