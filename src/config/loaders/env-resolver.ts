/**
 * Environment Variable Resolver
 * Resolves $env:VAR_NAME references in descriptor values
 */

const ENV_REF_PATTERN = /^\$env:([A-Z_][A-Z0-9_]*)$/;

type Env = Record<string, string | undefined>;

export interface EnvResolverOptions {
  env?: Env;
}

/**
 * Resolve a single environment variable reference
 * @param ref - Reference string (e.g., "$env:GITHUB_TOKEN")
 * @returns Resolved value, or the original string if it is not a reference or
 *   the variable is undefined
 */
export function resolveEnvRef(ref: string, options: EnvResolverOptions = {}): string {
  const match = ENV_REF_PATTERN.exec(ref);
  if (!match || !match[1]) {
    return ref;
  }

  const varName = match[1];
  const value = (options.env ?? process.env)[varName];

  return value ?? ref;
}

/**
 * Resolve every value of a string map
 */
export function resolveEnvMap(
  values: Record<string, string>,
  options: EnvResolverOptions = {},
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(values).map(([key, value]) => [key, resolveEnvRef(value, options)]),
  );
}

/**
 * Names of all variables referenced by a string map
 */
export function extractEnvRefs(values: Record<string, string>): string[] {
  const refs = new Set<string>();
  for (const value of Object.values(values)) {
    const match = ENV_REF_PATTERN.exec(value);
    if (match?.[1]) {
      refs.add(match[1]);
    }
  }
  return Array.from(refs);
}

/**
 * Referenced variables that are not defined in the environment
 */
export function findMissingEnvVars(refs: string[], env: Env = process.env): string[] {
  return refs.filter((name) => env[name] === undefined);
}
