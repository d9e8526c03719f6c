/**
 * Trim the trailing dot of a fully-qualified name. Bunny does not use FQDNs.
 *
 * - `example.com.` → `example.com`
 * - `example.com` → `example.com`
 */
export function unFqdn(name: string): string {
  return name.endsWith('.') ? name.slice(0, -1) : name;
}

/**
 * Zone apexes that could own `domain`, most specific first.
 * The bare TLD is never a candidate.
 *
 * - `a.b.example.com` → `['a.b.example.com', 'b.example.com', 'example.com']`
 * - `localhost` → `['localhost']`
 */
export function apexCandidates(domain: string): string[] {
  const parts = domain.split('.');
  if (parts.length < 2) {
    return [domain];
  }

  const candidates: string[] = [];
  for (let i = 0; i < parts.length - 1; i++) {
    candidates.push(parts.slice(i).join('.'));
  }
  return candidates;
}

/** The least specific candidate, used as the zone search term */
export function searchTerm(domain: string): string {
  const candidates = apexCandidates(domain);
  return candidates[candidates.length - 1] ?? domain;
}

/**
 * Labels of `domain` below `apex`, lower-cased; empty when they are equal.
 *
 * - (`test.Sub.example.com`, `example.com`) → `test.sub`
 */
export function nameBaseOf(domain: string, apex: string): string {
  if (domain.length <= apex.length) {
    return '';
  }
  return domain.slice(0, domain.length - apex.length - 1).toLowerCase();
}
