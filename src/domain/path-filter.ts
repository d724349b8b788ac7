export type PathPredicate = (absolutePath: string) => boolean;

export interface PathMatcher {
  accepts(absolutePath: string): boolean;
}

/**
 * A caller-owned decision over an absolute path. Either a plain function or an
 * object exposing `accepts`. Must not depend on call order.
 */
export type PathFilter = PathPredicate | PathMatcher;

export const toPredicate = (filter: PathFilter): PathPredicate => {
  if (typeof filter === 'function') {
    return filter;
  }
  return (absolutePath) => filter.accepts(absolutePath);
};

export const endsWithAny = (suffixes: string[]): PathPredicate => {
  return (absolutePath) => suffixes.some((suffix) => absolutePath.endsWith(suffix));
};

/** Rejects directories such as `.../examples` while keeping everything else. */
export const rejectEndingWith = (suffixes: string[]): PathPredicate => {
  const matches = endsWithAny(suffixes);
  return (absolutePath) => !matches(absolutePath);
};

export const matchesPattern = (pattern: RegExp): PathPredicate => {
  // g and y flags make test() stateful
  const stateless = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return (absolutePath) => stateless.test(absolutePath);
};
