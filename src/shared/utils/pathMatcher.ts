/**
 * Ant-style path matching
 *
 * - `?`  matches one character within a segment
 * - `*`  matches zero or more characters within a segment
 * - `**` matches zero or more whole segments
 *
 * @example
 * matchPath('/actuator/**', '/actuator/health/liveness') // true
 * matchPath('/api/*', '/api/users/1')                    // false
 */

const compiled = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

function segmentToRegExp(segment: string): string {
  return escapeRegExp(segment).replace(/\*/g, '[^/]*').replace(/\?/g, '[^/]');
}

/**
 * Compile an Ant pattern into an anchored regular expression
 */
export function compilePattern(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  const segments = pattern.split('/').filter(Boolean);
  let source = '';

  for (const segment of segments) {
    if (segment === '**') {
      // zero or more segments, each with its leading slash
      source += '(?:/[^/]*)*';
    } else {
      source += `/${segmentToRegExp(segment)}`;
    }
  }

  const regExp = new RegExp(`^${source || '/'}/?$`);
  compiled.set(pattern, regExp);
  return regExp;
}

export function matchPath(pattern: string, path: string): boolean {
  return compilePattern(pattern).test(path);
}

export function matchesAny(patterns: readonly string[], path: string): boolean {
  return patterns.some((pattern) => matchPath(pattern, path));
}
