/**
 * Production Safety Middleware
 * Rate limiting, timeouts, CORS, logging
 */

import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';

/**
 * Rate limiter for analytics requests
 * - 300 requests per 15 minutes per IP
 * - repeat navigation is served from cache, this only guards against abuse
 */
export const apiRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    success: false,
    error: {
      code: 'RateLimited',
      category: 'validation_error',
      message: 'Too many requests from this IP. Please try again later.',
      recoverable: true,
      suggestions: ['Wait a few minutes before retrying']
    }
  }
});

/**
 * Request timeout middleware
 * the upstream fetch keeps running after a timeout so the cache still fills
 */
export function requestTimeout(timeoutMs: number = 30000) {
  return (req: Request, res: Response, next: NextFunction) => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res.status(504).json({
          success: false,
          error: {
            code: 'RequestTimeout',
            category: 'upstream_error',
            message: `Request exceeded ${timeoutMs}ms timeout`,
            season: null,
            round: null,
            recoverable: true,
            suggestions: ['Data is still loading, try again shortly']
          }
        });
      }
    }, timeoutMs);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));

    next();
  };
}

/**
 * CORS configuration
 * - localhost front ends plus CORS_ALLOWED_ORIGINS
 */
export function configureCORS(extraOrigins: string[] = []) {
  const origins = [
    'http://localhost:3000',
    'http://localhost:5000',
    'http://localhost:5173',
    'http://localhost:8080',
    ...extraOrigins
  ];

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    // Allow requests with no origin (like curl)
    if (!origin) {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }

    res.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    res.header('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }

    next();
  };
}

export function getRequestId(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : undefined;
}

/**
 * Structured request logger
 * - one JSON line per request and per response
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const requestId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  console.log(JSON.stringify({
    type: 'request',
    request_id: requestId,
    timestamp: new Date().toISOString(),
    method: req.method,
    path: req.path,
    ip: req.ip || req.socket.remoteAddress,
    user_agent: req.get('user-agent')
  }));

  res.on('finish', () => {
    console.log(JSON.stringify({
      type: 'response',
      request_id: requestId,
      timestamp: new Date().toISOString(),
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - start
    }));
  });

  next();
}

/**
 * Mask sensitive data in error messages
 */
export function maskSensitiveData(data: unknown): unknown {
  if (typeof data === 'string') {
    // Mask credentials embedded in URLs
    let masked = data.replace(/(https?:\/\/)[^/@\s]+@/gi, '$1***@');
    // Mask API keys passed as query parameters
    masked = masked.replace(/([?&](?:api_?key|token|key)=)[^&\s]+/gi, '$1***');
    // Mask Bearer tokens
    masked = masked.replace(/Bearer\s+[a-zA-Z0-9-_.]+/gi, 'Bearer ***');
    return masked;
  } else if (Array.isArray(data)) {
    return data.map(item => maskSensitiveData(item));
  } else if (typeof data === 'object' && data !== null) {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (/api[_-]?key|password|token|secret|auth/i.test(key)) {
        masked[key] = '***';
      } else {
        masked[key] = maskSensitiveData(value);
      }
    }
    return masked;
  }
  return data;
}

/**
 * Safe error logger that masks secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>) {
  const errorData = {
    type: 'error',
    timestamp: new Date().toISOString(),
    error: error instanceof Error ? {
      name: error.name,
      message: maskSensitiveData(error.message),
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined
    } : maskSensitiveData(error),
    context: context ? maskSensitiveData(context) : undefined
  };

  console.error(JSON.stringify(errorData));
}
