/**
 * Route-object naming heuristic shared by every detection tier
 */

import { HTTP_METHODS, type HttpMethod } from '../types/index.js';

const ROUTE_OBJECT_KEYWORDS = new Set(['app', 'router', 'route', 'api', 'controller', 'server']);
const ROUTE_OBJECT_SUFFIXES = ['router', 'routes', 'route', 'app', 'server', 'controller', 'api'];
const ROUTE_OBJECT_PREFIXES = ['app', 'api'];

/**
 * True when `name` looks like an object routes are registered on:
 * `app`, `userRouter`, `apiV1`, `this.router`.
 */
export function isRouteObjectName(name: string): boolean {
  const lastDot = name.lastIndexOf('.');
  const low = (lastDot === -1 ? name : name.slice(lastDot + 1)).trim().toLowerCase();
  if (low.length === 0) return false;

  return (
    ROUTE_OBJECT_KEYWORDS.has(low) ||
    ROUTE_OBJECT_SUFFIXES.some(suffix => low.endsWith(suffix)) ||
    ROUTE_OBJECT_PREFIXES.some(prefix => low.startsWith(prefix))
  );
}

/**
 * Upper-cased verb for a method or decorator name, or null
 */
export function toHttpMethod(name: string): HttpMethod | null {
  const upper = name.trim().toUpperCase();
  return HTTP_METHODS.find(method => method === upper) ?? null;
}
