function normalizePhrase(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-phrase match: "Canada" matches "Toronto, Canada" and "US" matches
 * "Austin, US", but "US" does not match "Australia".
 */
export function matchApprovedLocation(location: string, approvedLocations: string[]): string | null {
  const normalizedLocation = normalizePhrase(location);
  if (!normalizedLocation) {
    return null;
  }

  for (const approved of approvedLocations) {
    const normalizedApproved = normalizePhrase(approved);
    if (!normalizedApproved) {
      continue;
    }
    if (normalizedLocation === normalizedApproved) {
      return approved.trim();
    }
    const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(normalizedApproved)}($|[^a-z0-9])`);
    if (pattern.test(normalizedLocation)) {
      return approved.trim();
    }
  }
  return null;
}

/** Companies from the list that equal a tier-1 name, ignoring case and surrounding spaces. */
export function matchTier1Companies(companies: string[], tier1Companies: string[]): string[] {
  const tier1 = new Set(tier1Companies.map(normalizePhrase).filter((name) => name.length > 0));
  const matched: string[] = [];
  for (const company of companies) {
    const trimmed = company.trim();
    if (trimmed && tier1.has(normalizePhrase(trimmed)) && !matched.includes(trimmed)) {
      matched.push(trimmed);
    }
  }
  return matched;
}
