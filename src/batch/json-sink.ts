/**
 * JSON result sink
 *
 * One pretty-printed record per document, named after the document
 * without its extension.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { ResultSet } from '../types.js';
import { AnalysisError } from '../errors.js';

export interface ResultSink {
  write(documentName: string, result: ResultSet): Promise<string>;
}

export function outputFileName(documentName: string): string {
  return `${path.parse(documentName).name}.json`;
}

export class JsonResultSink implements ResultSink {
  constructor(private readonly outputDir: string) {}

  async write(documentName: string, result: ResultSet): Promise<string> {
    const outputPath = path.join(this.outputDir, outputFileName(documentName));

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(outputPath, JSON.stringify(result, null, 4) + '\n', 'utf-8');
    } catch (err) {
      throw new AnalysisError(
        'SINK_FAILED',
        `Cannot write ${outputPath}: ${err instanceof Error ? err.message : 'Unknown error'}`,
        documentName,
        { cause: err }
      );
    }

    return outputPath;
  }
}
