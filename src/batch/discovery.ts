/**
 * Input document discovery
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { AnalysisError } from '../errors.js';

export interface DiscoveredDocument {
  name: string;
  path: string;
}

/**
 * Regular files directly inside `inputDir` with one of `extensions`
 * (case-insensitive), sorted by name
 */
export async function discoverDocuments(
  inputDir: string,
  extensions: readonly string[]
): Promise<DiscoveredDocument[]> {
  const wanted = new Set(extensions.map(ext => ext.toLowerCase()));

  const entries = await fs.readdir(inputDir, { withFileTypes: true }).catch((err: unknown) => {
    throw new AnalysisError(
      'INPUT_UNAVAILABLE',
      `Cannot read input directory ${inputDir}`,
      undefined,
      { cause: err }
    );
  });

  return entries
    .filter(entry => entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase()))
    .map(entry => ({ name: entry.name, path: path.join(inputDir, entry.name) }))
    .sort((a, b) => a.name.localeCompare(b.name));
}
