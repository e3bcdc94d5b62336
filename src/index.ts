#!/usr/bin/env node

/**
 * section-ranker-mcp
 *
 * MCP server that ranks the sections of PDF and text documents by
 * relevance to a reader persona and the job they need done.
 */

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig, validateConfig } from './config.js';
import { loadLexicalResource } from './lexicon/resource.js';
import { createDefaultProviders } from './extractors/index.js';
import { executeRank, getRankInputSchema, parseRankArguments } from './tools/rank.js';
import { executeKeywords, getKeywordsInputSchema } from './tools/keywords.js';
import { requireRecord, requireText } from './tools/arguments.js';
import { listResources, listResourceTemplates, readResource } from './resources/handlers.js';
import { getResultStore, setResourceListChangedNotifier } from './resources/store.js';

const PROMPTS = [
  {
    name: 'rank_document',
    title: 'Rank Document Sections',
    description: 'Rank the sections of a document for a persona and a job',
    arguments: [
      { name: 'document', description: 'Document file name', required: true },
      { name: 'persona', description: 'Who is reading', required: true },
      { name: 'job', description: 'What the reader needs to get done', required: true },
    ],
  },
];

function getArgs(
  args: Record<string, string> | undefined,
  required: string[]
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const key of required) {
    const value = args?.[key];
    if (!value || value.trim() === '') {
      throw new McpError(ErrorCode.InvalidParams, `Missing required argument: ${key}`);
    }
    resolved[key] = value;
  }
  return resolved;
}

function buildRankDocumentPrompt(args: Record<string, string>): string {
  const payload = {
    document: {
      name: args['document'] ?? '',
      raw_bytes: '<base64 file contents>',
    },
    persona: args['persona'] ?? '',
    job: args['job'] ?? '',
  };

  return [
    'Call the `rank_sections` tool with the following input.',
    'If you already have the page text, send `document.pages` ([{ "page_number": 1, "text": "..." }]) instead of `raw_bytes`.',
    '```json',
    JSON.stringify(payload, null, 2),
    '```',
    '',
    'Then summarize the top-ranked sections for the reader, citing page numbers.',
  ].join('\n');
}

// Tool definitions
const TOOLS = [
  {
    name: 'rank_sections',
    description: `Rank the paragraphs of a PDF or text document by relevance to a reader persona and their job to be done.

Keywords are taken from the persona and job (stop words removed). Each paragraph scores the number of distinct keywords it contains divided by its word count; the top sections come back with a title, page number and full text.

After success, re-read the result via: sectionrank://result/{result_id} or sectionrank://excerpts/{result_id}`,
    inputSchema: getRankInputSchema(),
  },
  {
    name: 'extract_keywords',
    description: 'List the keywords a persona or job description contributes to scoring.',
    inputSchema: getKeywordsInputSchema(),
  },
];

const SERVER_INSTRUCTIONS = [
  'Results: every rank_sections call is cached and accessible via MCP resources.',
  '',
  'URI patterns (replace {result_id} with the id from the tool result):',
  '  sectionrank://result/{result_id}   → full result JSON',
  '  sectionrank://excerpts/{result_id} → ranked excerpts as markdown',
].join('\n');

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    console.error('Configuration errors:');
    configErrors.forEach(err => console.error(`  - ${err}`));
    process.exit(1);
  }

  const lexicon = await loadLexicalResource({
    language: config.stopwordsLanguage,
    dataDir: config.lexiconDir,
  });
  const providers = createDefaultProviders(config);

  // Create MCP server
  const server = new Server(
    {
      name: 'section-ranker-mcp',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {
          listChanged: false,
        },
        prompts: {
          listChanged: false,
        },
        resources: {
          listChanged: true,
        },
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  setResourceListChangedNotifier(() => server.sendResourceListChanged());

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts: PROMPTS }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    switch (name) {
      case 'rank_document': {
        const resolved = getArgs(args, ['document', 'persona', 'job']);
        return {
          description: 'Rank the sections of a document for a persona and a job',
          messages: [
            {
              role: 'user',
              content: {
                type: 'text',
                text: buildRankDocumentPrompt(resolved),
              },
            },
          ],
        };
      }
      default:
        throw new McpError(ErrorCode.InvalidParams, `Prompt ${name} not found`);
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => listResources(getResultStore()));

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => listResourceTemplates());

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    return readResource(getResultStore(), request.params.uri);
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case 'rank_sections': {
          const result = await executeRank(parseRankArguments(args), { config, lexicon, providers });
          if (result.success) {
            console.error(
              `Ranked '${result.result?.metadata.input_document}': ${result.result?.extracted_sections.length} sections`
            );
          } else {
            console.error(`Ranking failed [${result.error?.code}]: ${result.error?.message}`);
          }

          return {
            content: [
              {
                type: 'text',
                text: JSON.stringify(result, null, 2),
              },
            ],
            isError: !result.success,
          };
        }

        case 'extract_keywords': {
          const argsObject = requireRecord(args, 'arguments');
          const text = requireText(argsObject['text'], 'text');
          const result = executeKeywords({ text }, lexicon);

          return {
            content: [
              {
                type: 'text',
                text: JSON.stringify(result, null, 2),
              },
            ],
          };
        }

        default:
          throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
      }
    } catch (err) {
      if (err instanceof McpError) {
        throw err;
      }
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: {
                code: 'TOOL_ERROR',
                message: err instanceof Error ? err.message : 'Unknown error',
              },
            }),
          },
        ],
        isError: true,
      };
    }
  });

  // Handle graceful shutdown
  const shutdown = async () => {
    console.error('Shutting down...');
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  // Start server
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('section-ranker-mcp server started');
}

// Run
main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
