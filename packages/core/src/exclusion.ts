import { ConfigurationError } from '#errors';

/** predicate deciding whether a uri bypasses the interceptor */
export type ExclusionPredicate = (uri: string) => boolean;

/**
 * normalized exclusion rule
 * @description one matching strategy per variant
 */
export type ExclusionSpec =
  | { kind: 'exact'; uri: string }
  | { kind: 'set'; uris: ReadonlySet<string> }
  | { kind: 'pattern'; pattern: RegExp }
  | { kind: 'predicate'; test: ExclusionPredicate };

/** exclusion rule as written in the configuration */
export type ExclusionInput =
  | string
  | readonly string[]
  | ReadonlySet<string>
  | RegExp
  | ExclusionPredicate
  | ExclusionSpec;

/**
 * anchors a pattern so that it only matches the whole uri
 * @param pattern pattern from the configuration
 * @returns pattern without global or sticky state, anchored at both ends
 */
function anchor(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, '');

  return new RegExp(`^(?:${pattern.source})$`, flags);
}

/**
 * checks whether every element of an iterable is a string
 * @param values values to check
 * @returns true if all values are strings
 */
function allStrings(values: Iterable<unknown>): boolean {
  for (const value of values) {
    if (typeof value !== 'string') {
      return false;
    }
  }

  return true;
}

/**
 * checks whether a value can be used as an exclusion predicate
 * @param value value to check
 * @returns true if the value is a function
 */
function isPredicate(value: unknown): value is ExclusionPredicate {
  return typeof value === 'function';
}

/**
 * checks whether a value is an already tagged exclusion spec
 * @param value value to check
 * @returns true if the value carries a known `kind`
 */
function isExclusionSpec(value: object): value is ExclusionSpec {
  if (!('kind' in value)) {
    return false;
  }

  switch (value.kind) {
    case 'exact':
      return 'uri' in value && typeof value.uri === 'string';
    case 'set':
      return (
        'uris' in value &&
        value.uris instanceof Set &&
        allStrings(value.uris.values())
      );
    case 'pattern':
      return 'pattern' in value && value.pattern instanceof RegExp;
    case 'predicate':
      return 'test' in value && typeof value.test === 'function';
    default:
      return false;
  }
}

/**
 * normalizes an exclusion rule from the configuration
 * @param input string, collection of strings, pattern, predicate or tagged spec
 * @returns tagged exclusion spec
 * @throws {ConfigurationError} when the shape is not supported
 */
export function toExclusionSpec(input: unknown): ExclusionSpec {
  if (typeof input === 'string') {
    return { kind: 'exact', uri: input };
  }

  if (isPredicate(input)) {
    return { kind: 'predicate', test: input };
  }

  if (input instanceof RegExp) {
    return { kind: 'pattern', pattern: anchor(input) };
  }

  if (Array.isArray(input) && allStrings(input)) {
    return { kind: 'set', uris: new Set<string>(input) };
  }

  if (input instanceof Set && allStrings(input.values())) {
    return { kind: 'set', uris: new Set<string>(input) };
  }

  if (typeof input === 'object' && input !== null && isExclusionSpec(input)) {
    return input.kind === 'pattern'
      ? { kind: 'pattern', pattern: anchor(input.pattern) }
      : input;
  }

  throw new ConfigurationError(
    'exclude must be a string, a collection of strings, a RegExp or a predicate function',
  );
}

/**
 * decides whether a uri is exempt from all OAuth2 processing
 * @param uri request path
 * @param spec normalized exclusion spec, if any
 * @returns true if the request must reach the downstream handler untouched
 */
export function isExcluded(uri: string, spec?: ExclusionSpec): boolean {
  if (!spec) {
    return false;
  }

  switch (spec.kind) {
    case 'exact':
      return spec.uri === uri;
    case 'set':
      return spec.uris.has(uri);
    case 'pattern':
      return spec.pattern.test(uri);
    case 'predicate':
      return spec.test(uri);
  }
}
