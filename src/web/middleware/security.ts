/**
 * Security middleware
 * Provides security headers, request logging, and rate limiting
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface SecurityConfig {
  /** Enable strict Content Security Policy */
  strictCSP: boolean;
  /** Enable HSTS (HTTP Strict Transport Security) */
  enableHSTS: boolean;
  /** HSTS max age in seconds */
  hstsMaxAge: number;
}

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  strictCSP: true,
  enableHSTS: true,
  hstsMaxAge: 31536000, // 1 year
};

/**
 * Security headers middleware
 */
export function securityHeaders(config: Partial<SecurityConfig> = {}): RequestHandler {
  const cfg = { ...DEFAULT_SECURITY_CONFIG, ...config };

  return (_req: Request, res: Response, next: NextFunction) => {
    // The API serves JSON only
    const csp = cfg.strictCSP
      ? "default-src 'none'; frame-ancestors 'none'; base-uri 'none'"
      : "default-src 'self'";

    res.setHeader('Content-Security-Policy', csp);
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');

    if (cfg.enableHSTS) {
      res.setHeader(
        'Strict-Transport-Security',
        `max-age=${cfg.hstsMaxAge}; includeSubDomains`
      );
    }

    res.setHeader('Cross-Origin-Resource-Policy', 'same-origin');
    res.removeHeader('X-Powered-By');

    next();
  };
}

/**
 * One log line per request, written when the response finishes
 */
export function requestLogging(disabled: boolean = false): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (disabled) {
      return next();
    }

    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(
        `[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`
      );
    });

    next();
  };
}

/**
 * Client address, used to count traffic before the caller is known
 */
export function clientAddress(req: Request): string {
  return `ip:${req.ip ?? req.socket.remoteAddress ?? 'unknown'}`;
}

/**
 * Fixed-window rate limiter, by client address unless a key generator is given
 */
export function rateLimiter(
  windowMs: number,
  maxRequests: number,
  keyGenerator: (req: Request, res: Response) => string = clientAddress
): RequestHandler {
  const requests = new Map<string, { count: number; resetAt: number }>();

  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyGenerator(req, res);
    const now = Date.now();

    // Clean up expired entries periodically
    if (Math.random() < 0.01) {
      for (const [k, v] of requests.entries()) {
        if (v.resetAt < now) {
          requests.delete(k);
        }
      }
    }

    let entry = requests.get(key);
    if (!entry || entry.resetAt < now) {
      entry = { count: 0, resetAt: now + windowMs };
      requests.set(key, entry);
    }

    entry.count++;

    if (entry.count > maxRequests) {
      res.status(429).json({
        error: 'Too many requests',
        retryAfter: Math.ceil((entry.resetAt - now) / 1000),
      });
      return;
    }

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetAt / 1000).toString());

    next();
  };
}
