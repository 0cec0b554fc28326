const COLON_PARAM_PATTERN = /:([A-Za-z_][\w-]*)/g;

/**
 * Rewrite `:param` segments to `{param}`
 *
 * @example normalizeRoute('/widgets/:id') // '/widgets/{id}'
 */
export function normalizeRoute(route: string): string;
export function normalizeRoute(route: string | null): string | null;
export function normalizeRoute(route: string | null): string | null {
  if (!route) return route;
  return route.replace(COLON_PARAM_PATTERN, '{$1}');
}

/**
 * Names of `{param}` segments, in order
 */
export function pathParameterNames(route: string): string[] {
  return Array.from(route.matchAll(/\{([^}/]+)\}/g), match => match[1] ?? '').filter(Boolean);
}
