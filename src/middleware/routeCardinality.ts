import type { Request, RequestHandler } from 'express';
import type { RouteCardinalityOverride, RouteMatch } from '../metrics/types';

declare global {
  namespace Express {
    interface Request {
      metricsCardinality?: RouteCardinalityOverride;
    }
  }
}

export type RouteMatcher = (req: Request) => RouteMatch | undefined;

interface RoutePath {
  path: string;
  /** Regular-expression routes carry no placeholders. */
  literal: boolean;
}

// The parts of an Express router layer the stack walk reads.
interface RouterLayer {
  regexp: RegExp;
  keys: readonly unknown[];
  route?: unknown;
  handle?: unknown;
}

interface MountedRoute {
  prefix: string;
  params: Record<string, string | undefined>;
}

const routePath = (route: unknown): RoutePath | undefined => {
  if (typeof route !== 'object' || route === null || !('path' in route)) return undefined;
  const { path } = route;
  if (typeof path === 'string') return { path, literal: false };
  if (path instanceof RegExp) return { path: String(path), literal: true };
  if (Array.isArray(path)) {
    return { path: path.map(String).join(','), literal: path.some((item) => item instanceof RegExp) };
  }
  return undefined;
};

const isLayer = (value: unknown): value is RouterLayer =>
  typeof value === 'object'
  && value !== null
  && 'regexp' in value
  && value.regexp instanceof RegExp
  && 'keys' in value
  && Array.isArray(value.keys);

const stackOf = (handle: unknown): readonly unknown[] | undefined => {
  if ((typeof handle !== 'function' && typeof handle !== 'object') || handle === null) return undefined;
  if (!('stack' in handle) || !Array.isArray(handle.stack)) return undefined;
  return handle.stack;
};

const keyName = (key: unknown, index: number): string => {
  if (typeof key === 'object' && key !== null && 'name' in key) {
    const { name } = key;
    if (typeof name === 'string' || typeof name === 'number') return String(name);
  }
  return String(index);
};

const decodeParam = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

const withIndices = new WeakMap<RegExp, RegExp>();

const execWithIndices = (regexp: RegExp, path: string): RegExpExecArray | null => {
  let indexed = withIndices.get(regexp);
  if (!indexed) {
    indexed = new RegExp(regexp.source, regexp.flags.replace(/[gy]/g, '') + (regexp.hasIndices ? '' : 'd'));
    withIndices.set(regexp, indexed);
  }
  return indexed.exec(path);
};

// Puts `:name` back where each parameter matched, then drops the trailing slash Express trims from mounts.
const mountTemplate = (match: RegExpExecArray, keys: readonly unknown[]): string => {
  const text = match[0];
  let template = '';
  let cursor = 0;
  keys.forEach((key, index) => {
    const span = match.indices?.[index + 1];
    if (!span) return;
    template += `${text.slice(cursor, span[0])}:${keyName(key, index)}`;
    cursor = span[1];
  });
  template += text.slice(cursor);
  return template.endsWith('/') ? template.slice(0, -1) : template;
};

const captureParams = (match: RegExpExecArray, keys: readonly unknown[]): Record<string, string | undefined> => {
  const params: Record<string, string | undefined> = {};
  keys.forEach((key, index) => {
    const value = match[index + 1];
    params[keyName(key, index)] = value === undefined ? undefined : decodeParam(value);
  });
  return params;
};

/**
 * Finds the chain of router mounts leading to `route` by replaying Express's
 * layer matching on `path`. Mount prefixes come back as templates, never as
 * the URL text that matched them.
 */
const findMountedRoute = (
  stack: readonly unknown[],
  route: unknown,
  path: string,
  outer: MountedRoute,
): MountedRoute | undefined => {
  for (const layer of stack) {
    if (!isLayer(layer)) continue;
    const match = execWithIndices(layer.regexp, path);
    if (!match) continue;

    if (layer.route !== undefined) {
      if (layer.route === route) {
        return { prefix: outer.prefix, params: { ...outer.params, ...captureParams(match, layer.keys) } };
      }
      continue;
    }

    const inner = stackOf(layer.handle);
    if (!inner) continue;
    const rest = path.slice(match[0].length);
    const found = findMountedRoute(inner, route, rest.startsWith('/') ? rest : `/${rest}`, {
      prefix: `${outer.prefix}${mountTemplate(match, layer.keys)}`,
      params: { ...outer.params, ...captureParams(match, layer.keys) },
    });
    if (found) return found;
  }
  return undefined;
};

const requestPathname = (req: Request): string | undefined => {
  const url = req.originalUrl;
  if (!url.startsWith('/')) return undefined;
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
};

/**
 * Reads the route Express matched: the mount templates plus the route's own template.
 * Requests only handled by `app.use()` middleware have no `req.route` and count as unmatched.
 * The result does not depend on `req.baseUrl` or `req.params`, so it stays the same after
 * an error has left a sub-router. Routes the stack walk cannot reach (sub-apps) fall back
 * to `req.baseUrl` and `req.params`.
 */
export const expressRouteMatch: RouteMatcher = (req) => {
  const route: unknown = req.route;
  const own = routePath(route);
  if (own === undefined) return undefined;

  const root = stackOf(req.app._router);
  const pathname = requestPathname(req);
  const mounted = root && pathname !== undefined
    ? findMountedRoute(root, route, pathname, { prefix: '', params: {} })
    : undefined;

  const prefix = mounted ? mounted.prefix : req.baseUrl;
  const params = mounted ? mounted.params : { ...req.params };
  return { pattern: `${prefix}${own.path}`, params, ...(own.literal && { literal: true }) };
};

/**
 * Route-level middleware keeping the literal values of the named parameters in the
 * route label, e.g. `app.get('/posts/:language/:slug', keepParamCardinality('language'), handler)`.
 */
export const keepParamCardinality = (...params: string[]): RequestHandler => {
  const override: RouteCardinalityOverride = Object.freeze({ keepParams: new Set(params) });
  return (req, _res, next) => {
    req.metricsCardinality = override;
    next();
  };
};
