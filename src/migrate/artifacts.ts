export type NameMatcher = (name: string) => boolean

function escapeRegex(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, "\\$&")
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("*")
    .map((part) => escapeRegex(part))
    .join(".*")
  return new RegExp(`^${source}$`, "u")
}

/** Matches entry names against `*`-globs such as `*.tmp`. An empty list matches nothing. */
export function createExcludeMatcher(patterns: readonly string[]): NameMatcher {
  const expressions = patterns
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0)
    .map(globToRegExp)

  if (expressions.length === 0) {
    return () => false
  }

  return (name) => expressions.some((expression) => expression.test(name))
}
