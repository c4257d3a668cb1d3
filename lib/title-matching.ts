/**
 * Title Matching Library
 *
 * Canonicalizes event titles so the personal feed and the reference timetable
 * can be compared. Timetable entries wrap the lecture name in an
 * administrative preamble ("Program: ...") and a trailing signature block
 * ("sign: ...", "moment: ..."); the core title is the window between the
 * anchor keyword and the first delimiter.
 */

// ============================================================================
// Types
// ============================================================================

export interface TitleRules {
  /** Keyword where the comparable part of a title begins */
  anchor: string;
  /** Tokens that end the comparable part; the earliest one wins */
  delimiters: string[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TITLE_RULES: TitleRules = {
  anchor: "laboratoriemedicin",
  delimiters: ["sign:", "moment:"],
};

// ============================================================================
// Normalization
// ============================================================================

/**
 * Collapse whitespace runs to one space, trim, and lowercase.
 */
export function normalizeTitle(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * Extract the core lecture title from a summary.
 *
 * Example:
 *   "Program: ... Laboratoriemedicin vår T3 [BMA401 VT25] sign: abc"
 *     -> "laboratoriemedicin vår t3 [bma401 vt25]"
 *
 * Summaries without the anchor are returned trimmed but otherwise untouched.
 */
export function extractCoreTitle(
  summary: string,
  rules: TitleRules = DEFAULT_TITLE_RULES
): string {
  const normalized = normalizeTitle(summary);
  const anchor = normalizeTitle(rules.anchor);
  const anchorIndex = anchor ? normalized.indexOf(anchor) : -1;

  if (anchorIndex === -1) {
    return summary.trim();
  }

  const fromAnchor = normalized.slice(anchorIndex);
  let cut = fromAnchor.length;
  for (const delimiter of rules.delimiters) {
    const token = delimiter.toLowerCase();
    if (!token) continue;
    const index = fromAnchor.indexOf(token);
    if (index !== -1 && index < cut) {
      cut = index;
    }
  }

  return fromAnchor.slice(0, cut).trim();
}

/**
 * The string two feeds are compared on: the core title, normalized again so
 * anchor-less titles compare case- and whitespace-insensitively too.
 */
export function comparisonTitle(
  summary: string,
  rules: TitleRules = DEFAULT_TITLE_RULES
): string {
  return normalizeTitle(extractCoreTitle(summary, rules));
}

/**
 * Substring match in either direction.
 */
export function titlesOverlap(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}
