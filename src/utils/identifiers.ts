const BARE_NUMBER_RE = /^\d+$/;
const BARE_ISSUE_NUMBER_IN_QUERY_RE = /\b(\d{3,})\b/g;

/**
 * Qualifies a bare issue number with the default project key: "123" -> "DEMO-123".
 * Identifiers that already contain a dash, or anything that is not all digits,
 * are returned unchanged.
 */
export function normalizeIssueId(issueId: string, defaultProjectKey?: string): string {
  if (!issueId) return issueId;
  if (issueId.includes("-")) return issueId;
  if (BARE_NUMBER_RE.test(issueId) && defaultProjectKey) {
    return `${defaultProjectKey}-${issueId}`;
  }
  return issueId;
}

/**
 * Prefixes every standalone number of three or more digits in a search query with the
 * default project key. Any such number is rewritten, including ones that are not
 * issue references ("1000 items").
 */
export function normalizeQueryParameter(query: string, defaultProjectKey?: string): string {
  if (!query || !defaultProjectKey) return query;
  return query.replace(BARE_ISSUE_NUMBER_IN_QUERY_RE, (_match, number: string) => `${defaultProjectKey}-${number}`);
}

/** Project short name of a qualified identifier: "DEMO-123" -> "DEMO". */
export function projectKeyOf(issueId: string): string | undefined {
  const dash = issueId.lastIndexOf("-");
  return dash > 0 ? issueId.slice(0, dash) : undefined;
}
