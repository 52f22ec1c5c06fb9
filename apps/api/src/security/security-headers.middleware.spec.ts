import type { Request, Response } from 'express';
import {
  createSecurityHeadersMiddleware,
  noStoreMiddleware,
} from './security-headers.middleware';

type HeaderStore = Record<string, string>;

function run(
  middleware: (req: Request, res: Response, next: () => void) => void,
  reqPartial: Partial<Request>,
): { headers: HeaderStore; nextCalled: boolean } {
  const headers: HeaderStore = {};
  const req = {
    originalUrl: '/api/settings',
    url: '/api/settings',
    secure: false,
    ...reqPartial,
  } as Request;
  const res = {
    setHeader: (k: string, v: string) => {
      headers[k] = v;
    },
  } as unknown as Response;

  let nextCalled = false;
  middleware(req, res, () => {
    nextCalled = true;
  });
  return { headers, nextCalled };
}

describe('security headers middleware', () => {
  const middleware = createSecurityHeadersMiddleware({
    docsPath: 'api/docs',
    hsts: true,
  });

  it('sets hardening headers and a locked-down CSP on API routes', () => {
    const { headers, nextCalled } = run(middleware, {});

    expect(nextCalled).toBe(true);
    expect(headers['X-Content-Type-Options']).toBe('nosniff');
    expect(headers['X-Frame-Options']).toBe('DENY');
    expect(headers['Content-Security-Policy']).toBe(
      "default-src 'none'; base-uri 'none'; form-action 'none'; frame-ancestors 'none'",
    );
  });

  it('leaves the docs without CSP', () => {
    const { headers } = run(middleware, { originalUrl: '/api/docs/index.html' });
    expect(headers['Content-Security-Policy']).toBeUndefined();
    expect(headers['X-Frame-Options']).toBe('DENY');
  });

  it('sends HSTS only on secure requests when enabled', () => {
    expect(run(middleware, { secure: false }).headers['Strict-Transport-Security'])
      .toBeUndefined();
    expect(run(middleware, { secure: true }).headers['Strict-Transport-Security'])
      .toBe('max-age=31536000');

    const off = createSecurityHeadersMiddleware({
      docsPath: 'api/docs',
      hsts: false,
    });
    expect(run(off, { secure: true }).headers['Strict-Transport-Security'])
      .toBeUndefined();
  });
});

describe('no-store middleware', () => {
  it('marks responses as uncacheable', () => {
    const { headers, nextCalled } = run(noStoreMiddleware, {});
    expect(headers).toEqual({
      'Cache-Control': 'no-store, no-cache, must-revalidate, private, max-age=0',
      Pragma: 'no-cache',
      Expires: '0',
    });
    expect(nextCalled).toBe(true);
  });
});
