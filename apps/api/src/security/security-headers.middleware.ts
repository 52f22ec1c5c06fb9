import type { NextFunction, Request, Response } from 'express';

// JSON only: nothing served from the API needs to load sub-resources.
const API_CSP = [
  "default-src 'none'",
  "base-uri 'none'",
  "form-action 'none'",
  "frame-ancestors 'none'",
].join('; ');

const NO_STORE_VALUE = 'no-store, no-cache, must-revalidate, private, max-age=0';

const HARDENING_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ['X-Content-Type-Options', 'nosniff'],
  ['X-Frame-Options', 'DENY'],
  ['Referrer-Policy', 'no-referrer'],
  ['Cross-Origin-Opener-Policy', 'same-origin'],
  ['Cross-Origin-Resource-Policy', 'same-origin'],
];

export type SecurityHeadersOptions = {
  /** Swagger UI ships inline assets; no CSP under this path. */
  docsPath: string;
  /** Send HSTS on HTTPS requests. */
  hsts: boolean;
};

function requestPath(req: Request): string {
  return (req.originalUrl || req.url || '').split('?')[0] ?? '';
}

export function createSecurityHeadersMiddleware(options: SecurityHeadersOptions) {
  const docsPrefix = `/${options.docsPath.replace(/^\/+/, '')}`;

  return (req: Request, res: Response, next: NextFunction) => {
    for (const [name, value] of HARDENING_HEADERS) res.setHeader(name, value);

    if (!requestPath(req).startsWith(docsPrefix)) {
      res.setHeader('Content-Security-Policy', API_CSP);
    }
    if (options.hsts && req.secure) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000');
    }
    next();
  };
}

/** Settings and run records are private state; never let a proxy cache them. */
export function noStoreMiddleware(
  _req: Request,
  res: Response,
  next: NextFunction,
) {
  res.setHeader('Cache-Control', NO_STORE_VALUE);
  res.setHeader('Pragma', 'no-cache');
  res.setHeader('Expires', '0');
  next();
}
