/**
 * Build the title query used to find a credential's vault item:
 * the lowercased issuer and credential names joined by a single space.
 *
 * No other normalization is applied; surrounding or repeated whitespace in
 * either name is kept as-is.
 */
export function buildSearchKey(issuerName: string, credentialName: string): string {
  return `${issuerName.toLowerCase()} ${credentialName.toLowerCase()}`;
}
