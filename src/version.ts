const VERSION_REGEX = /^[0-9]+(?:\.[0-9]+)*$/;

export function isValidVersion(version: string): boolean {
  return VERSION_REGEX.test(version);
}

export function compareVersions(a: string, b: string): number {
  const left = a.split(".").map((n) => parseInt(n, 10));
  const right = b.split(".").map((n) => parseInt(n, 10));
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}
