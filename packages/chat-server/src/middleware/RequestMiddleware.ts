import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { rateLimit } from 'express-rate-limit';

export interface RateLimitOptions {
    perMinute: number;
    perHour: number;
    /** Paths that are never counted, such as health checks. */
    excludedPaths?: string[];
}

/** Tags every request with an id and logs method, path, status and duration once it finishes. */
export function requestLogger(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const requestId = randomUUID();
        const startedAt = process.hrtime.bigint();
        res.setHeader('X-Request-ID', requestId);

        console.log(`[HTTP] [${requestId}] ${req.method} ${req.path} from ${req.ip ?? 'unknown'}`);

        res.on('finish', () => {
            const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
            const log = res.statusCode >= 500 ? console.error : res.statusCode >= 400 ? console.warn : console.log;
            log(`[HTTP] [${requestId}] ${req.method} ${req.path} - ${res.statusCode} - ${durationMs.toFixed(1)}ms`);
        });

        next();
    };
}

function limiter(limit: number, windowMs: number, window: string, excludedPaths: string[]): RequestHandler {
    return rateLimit({
        windowMs,
        limit,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
        skip: (req) => excludedPaths.includes(req.path),
        handler: (req, res) => {
            console.warn('[RateLimit] Limit exceeded:', { ip: req.ip, window });
            res.status(429).json({
                error: {
                    message: `Rate limit exceeded: ${limit} requests per ${window}`,
                    type: 'rate_limit_error'
                }
            });
        }
    });
}

/** Per-client fixed-window limits, checked minute first. */
export function rateLimiters(options: RateLimitOptions): RequestHandler[] {
    const excluded = options.excludedPaths ?? ['/health'];
    return [
        limiter(options.perMinute, 60_000, 'minute', excluded),
        limiter(options.perHour, 3_600_000, 'hour', excluded)
    ];
}
