/**
 * Version range matching for dependency checks.
 *
 * Supports `*`, exact versions, `^`, `~`, `>`, `>=`, `<`, `<=` and
 * space-separated comparator sets that must all hold. Pre-release and build
 * suffixes are ignored.
 */

function parseVersion(value: string): number[] {
  return value
    .replace(/^[v=^~><]+/, "")
    .replace(/[-+].*$/, "")
    .split(".")
    .map((part) => Number.parseInt(part, 10) || 0);
}

function compareVersions(a: number[], b: number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const partA = a[i] ?? 0;
    const partB = b[i] ?? 0;
    if (partA > partB) {
      return 1;
    }
    if (partA < partB) {
      return -1;
    }
  }
  return 0;
}

function satisfiesComparator(version: number[], comparator: string): boolean {
  if (comparator === "*" || comparator === "x") {
    return true;
  }

  const target = parseVersion(comparator);
  const cmp = compareVersions(version, target);
  const [major = 0, minor = 0, patch = 0] = version;
  const [targetMajor = 0, targetMinor = 0, targetPatch = 0] = target;

  // Caret: same major (same minor below 1.0)
  if (comparator.startsWith("^")) {
    if (cmp < 0) {
      return false;
    }
    return targetMajor === 0 ? major === 0 && minor === targetMinor : major === targetMajor;
  }

  // Tilde: same major and minor
  if (comparator.startsWith("~")) {
    return major === targetMajor && minor === targetMinor && patch >= targetPatch;
  }

  if (comparator.startsWith(">=")) {
    return cmp >= 0;
  }
  if (comparator.startsWith(">")) {
    return cmp > 0;
  }
  if (comparator.startsWith("<=")) {
    return cmp <= 0;
  }
  if (comparator.startsWith("<")) {
    return cmp < 0;
  }

  return cmp === 0;
}

export function satisfiesVersion(version: string, range: string): boolean {
  const comparators = range.trim().split(/\s+/).filter((part) => part.length > 0);
  if (comparators.length === 0) {
    return true;
  }
  const parsed = parseVersion(version);
  return comparators.every((comparator) => satisfiesComparator(parsed, comparator));
}
