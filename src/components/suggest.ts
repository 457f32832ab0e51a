/**
 * Closest-name suggestions for mistyped component and template names.
 */

/**
 * Levenshtein distance (insert, delete, substitute; unit costs).
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1,
          (current[j - 1] ?? 0) + 1,
          (previous[j - 1] ?? 0) + cost
        )
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Candidates within a third of the target's length in edit distance (at
 * least 2), or containing the target as a substring, closest first.
 * Ties are broken alphabetically.
 */
export function closestNames(
  target: string,
  candidates: Iterable<string>,
  limit = 3
): string[] {
  const needle = target.toLowerCase();
  const threshold = Math.max(2, Math.floor(needle.length / 3));

  const scored: Array<{ name: string; distance: number }> = [];
  for (const name of candidates) {
    const distance = editDistance(needle, name.toLowerCase());
    if (distance <= threshold || (needle.length >= 3 && name.toLowerCase().includes(needle))) {
      scored.push({ name, distance });
    }
  }

  scored.sort((x, y) => x.distance - y.distance || x.name.localeCompare(y.name));
  return scored.slice(0, limit).map((entry) => entry.name);
}
