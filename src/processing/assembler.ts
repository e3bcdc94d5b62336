/**
 * Result Assembler
 */

import type { RankedUnit, ResultMetadata, ResultSet } from '../types.js';

export function assembleResult(metadata: ResultMetadata, ranked: readonly RankedUnit[]): ResultSet {
  return {
    metadata,
    extracted_sections: ranked.map(unit => ({
      document: unit.document,
      page_number: unit.page_number,
      section_title: unit.section_title,
      importance_rank: unit.importance_rank,
    })),
    sub_section_analysis: ranked.map(unit => ({
      document: unit.document,
      page_number: unit.page_number,
      refined_text: unit.text,
    })),
  };
}
