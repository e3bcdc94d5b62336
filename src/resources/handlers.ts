import type { Resource, ResourceTemplate, TextResourceContents } from '@modelcontextprotocol/sdk/types.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import type { ResultSet } from '../types.js';
import type { ResultStore, ResultEntry } from './store.js';

const RESOURCE_NOT_FOUND = -32002;

export type ResourceKind = 'result' | 'excerpts';

// sectionrank://<kind>/<percent-encoded result id>
const RESULT_URI = /^sectionrank:\/\/(result|excerpts)\/([^/?#]+)$/;

export function resultUri(kind: ResourceKind, resultId: string): string {
  return `sectionrank://${kind}/${encodeURIComponent(resultId)}`;
}

export function parseResultUri(uri: string): { kind: ResourceKind; resultId: string } | null {
  const match = RESULT_URI.exec(uri);
  if (!match) return null;

  const [, kind, encodedId] = match;
  if ((kind !== 'result' && kind !== 'excerpts') || encodedId === undefined) return null;

  try {
    return { kind, resultId: decodeURIComponent(encodedId) };
  } catch {
    // Malformed percent-encoding
    return null;
  }
}

const RESOURCE_MIME_TYPES: Record<ResourceKind, string> = {
  result: 'application/json',
  excerpts: 'text/markdown',
};

const RESOURCE_TEMPLATES: Array<{
  kind: ResourceKind;
  name: string;
  title: string;
  description: string;
}> = [
    {
      kind: 'result',
      name: 'sectionrank-result',
      title: 'Ranked Sections',
      description: 'Full ranking result JSON: metadata, ranked sections and excerpts.',
    },
    {
      kind: 'excerpts',
      name: 'sectionrank-excerpts',
      title: 'Ranked Excerpts',
      description: 'Markdown rendering of the ranked excerpts, most relevant first.',
    },
  ];

export function listResources(store: ResultStore): { resources: Resource[] } {
  return { resources: store.list().map(entry => buildResource(entry)) };
}

export function listResourceTemplates(): { resourceTemplates: ResourceTemplate[] } {
  return {
    resourceTemplates: RESOURCE_TEMPLATES.map(template => ({
      uriTemplate: `sectionrank://${template.kind}/{result_id}`,
      name: template.name,
      title: template.title,
      description: template.description,
      mimeType: RESOURCE_MIME_TYPES[template.kind],
    })),
  };
}

export function readResource(
  store: ResultStore,
  uri: string
): { contents: TextResourceContents[] } {
  const parsed = parseResultUri(uri);
  if (!parsed) {
    throw resourceNotFound(uri);
  }

  const entry = store.get(parsed.resultId);
  if (!entry) {
    throw resourceNotFound(uri);
  }

  const text = parsed.kind === 'result'
    ? JSON.stringify(entry.result, null, 2)
    : renderExcerpts(entry.result);

  return {
    contents: [
      {
        uri,
        mimeType: RESOURCE_MIME_TYPES[parsed.kind],
        text,
      },
    ],
  };
}

/**
 * Markdown view of a result: one heading per ranked section, then its text
 */
export function renderExcerpts(result: ResultSet): string {
  const parts: string[] = [`# ${result.metadata.input_document}`];

  if (result.extracted_sections.length === 0) {
    parts.push('_No relevant sections found._');
  }

  result.extracted_sections.forEach((section, idx) => {
    const excerpt = result.sub_section_analysis[idx];
    parts.push(`## ${section.importance_rank}. ${section.section_title}`);
    parts.push(`_Page ${section.page_number}_`);
    if (excerpt) {
      parts.push(excerpt.refined_text);
    }
  });

  return parts.join('\n\n') + '\n';
}

function buildResource(entry: ResultEntry): Resource {
  const { metadata } = entry.result;

  return {
    uri: resultUri('result', entry.result_id),
    name: entry.result_id,
    title: `Ranked sections: ${metadata.input_document}`,
    description: `${entry.result.extracted_sections.length} sections ranked for "${metadata.persona}" at ${metadata.processing_timestamp}`,
    mimeType: RESOURCE_MIME_TYPES.result,
    annotations: {
      lastModified: entry.stored_at,
    },
  };
}

function resourceNotFound(uri: string): McpError {
  return new McpError(RESOURCE_NOT_FOUND, 'Resource not found', { uri });
}
