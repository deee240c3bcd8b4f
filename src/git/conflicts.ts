import { truncateText } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConflictSection = {
  ours: string;
  theirs: string;
  // Character offset of the "<<<<<<<" marker within the file content.
  offset: number;
  length: number;
};

export type ConflictDetail = {
  file: string;
  sections: ConflictSection[];
  preview: string;
  previewTruncated: boolean;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const CONFLICT_REGION_PATTERN = /<<<<<<<[^\n]*\n([\s\S]*?)=======\r?\n([\s\S]*?)>>>>>>>[^\n]*/g;

export const PREVIEW_TRUNCATION_SUFFIX = "\n... (truncated)";

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseConflictSections(content: string): ConflictSection[] {
  const sections: ConflictSection[] = [];

  for (const match of content.matchAll(CONFLICT_REGION_PATTERN)) {
    sections.push({
      ours: match[1].trim(),
      theirs: match[2].trim(),
      offset: match.index ?? 0,
      length: match[0].length,
    });
  }

  return sections;
}

export function buildConflictDetail(
  file: string,
  content: string,
  previewChars: number,
): ConflictDetail {
  const preview = truncateText(content, previewChars, PREVIEW_TRUNCATION_SUFFIX);
  return {
    file,
    sections: parseConflictSections(content),
    preview: preview.text,
    previewTruncated: preview.truncated,
  };
}
