/**
 * DNS name helpers
 */

const LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

/**
 * Lowercase and drop the trailing root dot
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Route53 form: trailing dot
 */
export function toFqdn(domain: string): string {
  return domain.endsWith('.') ? domain : `${domain}.`;
}

/**
 * Hostname check: at least two labels, 1-63 chars each, 253 total
 */
export function isValidDomainName(domain: string): boolean {
  const normalized = normalizeDomain(domain);
  if (normalized.length === 0 || normalized.length > 253) {
    return false;
  }

  const labels = normalized.split('.');
  return labels.length >= 2 && labels.every((label) => LABEL_PATTERN.test(label));
}

/**
 * True when `zoneName` equals `domain` or is one of its parent domains.
 * Matching is on whole labels: example.org covers blog.example.org but not myexample.org.
 */
export function isLabelSuffix(zoneName: string, domain: string): boolean {
  const zone = normalizeDomain(zoneName);
  const name = normalizeDomain(domain);

  return zone.length > 0 && (name === zone || name.endsWith(`.${zone}`));
}

/**
 * The www alternate name served alongside the apex
 */
export function wwwAlias(domain: string): string {
  return `www.${normalizeDomain(domain)}`;
}
