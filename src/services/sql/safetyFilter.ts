/**
 * Read-only guard for user-supplied SQL.
 *
 * Token deny-list, not a parser: a column named `update` is rejected, and
 * comments, string literals, encodings or dynamic SQL are not analysed.
 */

export const BLOCKED_KEYWORDS = [
  'DROP',
  'DELETE',
  'INSERT',
  'UPDATE',
  'ALTER',
  'TRUNCATE',
  'EXEC',
  'EXECUTE',
  'MERGE',
  'CREATE',
] as const;

export type BlockedKeyword = (typeof BLOCKED_KEYWORDS)[number];

export type SafetyCheckResult =
  | { allowed: true }
  | { allowed: false; reason: string; keyword?: BlockedKeyword };

const blockedKeywordPattern = new RegExp(`\\b(${BLOCKED_KEYWORDS.join('|')})\\b`, 'i');
const selectPrefixPattern = /^SELECT\b/i;

function toBlockedKeyword(token: string): BlockedKeyword | undefined {
  const upper = token.toUpperCase();
  return BLOCKED_KEYWORDS.find(keyword => keyword === upper);
}

export function checkQuery(query: string): SafetyCheckResult {
  const trimmed = query.trim();
  if (!trimmed) {
    return { allowed: false, reason: 'Query must be a non-empty SELECT statement' };
  }

  // Checked over the whole text so `SELECT 1; DROP TABLE t` is caught
  const match = blockedKeywordPattern.exec(trimmed);
  const keyword = match ? toBlockedKeyword(match[1]) : undefined;
  if (keyword) {
    return {
      allowed: false,
      keyword,
      reason: `Query contains blocked keyword '${keyword}'. Only read-only SELECT statements are allowed.`,
    };
  }

  if (!selectPrefixPattern.test(trimmed)) {
    return { allowed: false, reason: 'Only SELECT queries are allowed' };
  }

  return { allowed: true };
}
