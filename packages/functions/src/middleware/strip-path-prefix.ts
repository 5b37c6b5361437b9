import type { RequestHandler } from 'express';

/**
 * Cloud Functions forwards the function name as the first path segment.
 * Strip it so routes can be declared relative to the resource.
 */
export function stripPathPrefix(resourceName: string): RequestHandler {
  const prefix = `/${resourceName}`;
  return (req, _res, next) => {
    if (req.url === prefix || req.url.startsWith(`${prefix}/`) || req.url.startsWith(`${prefix}?`)) {
      const rest = req.url.slice(prefix.length);
      req.url = rest.startsWith('/') ? rest : `/${rest}`;
    }
    next();
  };
}
