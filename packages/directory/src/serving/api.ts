/**
 * Restroom Directory HTTP API
 *
 * Thin JSON surface over `QueryService`:
 * - GET /v1/restrooms?swLat&swLon&neLat&neLon  viewport query
 * - GET /v1/restrooms/nearest?lat&lon           ordered by distance
 * - GET /v1/restrooms/:id                       single record
 * - GET /v1/places?q=                           place search
 * - GET /v1/places/:slug                        city center
 * - GET /v1/health
 *
 * Query parameters are validated with zod; every response uses the
 * `APIResponse` envelope with a request id and latency.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { RecordStore } from '../persistence/record-store.js';
import type { QueryService } from './query-service.js';

const log = createLogger({ module: 'api' });

const API_VERSION = 'v1';

/**
 * Standardized API response wrapper
 */
export interface APIResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: {
    readonly code: string;
    readonly message: string;
    readonly details?: unknown;
  };
  readonly meta: {
    readonly requestId: string;
    readonly latencyMs: number;
    readonly version: string;
  };
}

export interface DispatchResult {
  readonly status: number;
  readonly body: APIResponse<unknown>;
}

export interface RestroomAPIOptions {
  readonly queryService: QueryService;
  readonly store: RecordStore;
  readonly port?: number;
  readonly host?: string;
  readonly corsOrigins?: readonly string[];
}

/**
 * Request validation schemas (Zod)
 */
const latitude = z
  .string()
  .trim()
  .min(1, 'Latitude is required')
  .pipe(z.coerce.number().min(-90, 'Latitude must be >= -90').max(90, 'Latitude must be <= 90'));

const longitude = z
  .string()
  .trim()
  .min(1, 'Longitude is required')
  .pipe(z.coerce.number().min(-180, 'Longitude must be >= -180').max(180, 'Longitude must be <= 180'));

const boundsSchema = z.object({
  swLat: latitude,
  swLon: longitude,
  neLat: latitude,
  neLon: longitude,
});

/** Unusable values become undefined so the default center applies */
const optionalNumber = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value.trim() ? Number(value) : undefined));

const centerSchema = z.object({
  lat: optionalNumber,
  lon: optionalNumber,
});

const placeSearchSchema = z.object({
  q: z.string().trim().min(1, 'Query cannot be empty').max(100),
});

const slugSchema = z
  .string()
  .min(1)
  .max(120)
  .regex(/^[a-z0-9'-]+$/i, 'Slug may only contain letters, digits, hyphens and apostrophes');

const idSchema = z.coerce.number().int().positive();

/** Percent-decoded path segment, or null for malformed escapes */
function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

type Handler = (url: URL, segment: string) => Promise<DispatchResult>;

export class RestroomAPI {
  private readonly queryService: QueryService;
  private readonly store: RecordStore;
  private readonly port: number;
  private readonly host: string;
  private readonly corsOrigins: readonly string[];
  private readonly startedAt = Date.now();
  private server: Server | null = null;

  constructor(options: RestroomAPIOptions) {
    this.queryService = options.queryService;
    this.store = options.store;
    this.port = options.port ?? 8000;
    this.host = options.host ?? '0.0.0.0';
    this.corsOrigins = options.corsOrigins ?? ['*'];
  }

  /**
   * Start listening; resolves once the port is bound
   */
  start(): Promise<void> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        log.error('Unhandled request failure', { error: errorMessage(error) });
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        log.info('Restroom API server started', {
          version: API_VERSION,
          url: `http://${this.host}:${this.port}`,
        });
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        log.info('API server stopped');
        resolve();
      });
    });
  }

  /**
   * Route one request without touching the network
   */
  async dispatch(method: string, rawUrl: string, requestId: string): Promise<DispatchResult> {
    const startTime = performance.now();
    const url = new URL(rawUrl, 'http://localhost');
    const elapsed = (): number => performance.now() - startTime;

    if (method !== 'GET') {
      return this.failure(405, 'METHOD_NOT_ALLOWED', `Method ${method} not allowed`, requestId, elapsed());
    }

    const match = url.pathname.match(/^\/(v\d+)(\/.*)?$/);
    if (!match) {
      return this.failure(404, 'NOT_FOUND', `Endpoint not found: ${url.pathname}`, requestId, elapsed());
    }
    if (match[1] !== API_VERSION) {
      return this.failure(
        400,
        'UNSUPPORTED_VERSION',
        `API version ${match[1]} not supported. Current version: ${API_VERSION}`,
        requestId,
        elapsed()
      );
    }

    const basePath = (match[2] ?? '/').replace(/\/+$/, '') || '/';

    try {
      const routed = this.route(basePath);
      if (!routed) {
        return this.failure(404, 'NOT_FOUND', `Endpoint not found: ${url.pathname}`, requestId, elapsed());
      }

      const result = await routed.handler(url, routed.segment);
      return {
        status: result.status,
        body: {
          ...result.body,
          meta: { requestId, latencyMs: Math.round(elapsed() * 100) / 100, version: API_VERSION },
        },
      };
    } catch (error) {
      log.error('API request error', {
        requestId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return this.failure(500, 'INTERNAL_ERROR', 'Internal server error', requestId, elapsed());
    }
  }

  private route(basePath: string): { handler: Handler; segment: string } | null {
    if (basePath === '/restrooms') return { handler: (url) => this.handleBounds(url), segment: '' };
    if (basePath === '/restrooms/nearest') {
      return { handler: (url) => this.handleNearest(url), segment: '' };
    }
    if (basePath === '/places') return { handler: (url) => this.handlePlaceSearch(url), segment: '' };
    if (basePath === '/health') return { handler: () => this.handleHealth(), segment: '' };

    const restroom = basePath.match(/^\/restrooms\/([^/]+)$/);
    if (restroom?.[1]) {
      return { handler: (_url, id) => this.handleRestroomById(id), segment: restroom[1] };
    }

    const place = basePath.match(/^\/places\/([^/]+)$/);
    if (place?.[1]) {
      const raw = place[1];
      const slug = decodeSegment(raw);
      if (slug === null) {
        return {
          handler: async () => this.invalid('Invalid place slug', { slug: raw }),
          segment: raw,
        };
      }
      return { handler: (_url, decoded) => this.handlePlaceBySlug(decoded), segment: slug };
    }

    return null;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = randomBytes(8).toString('hex');
    this.setHeaders(res, requestId);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const { status, body } = await this.dispatch(req.method ?? 'GET', req.url ?? '/', requestId);
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  // ============================================================================
  // Handlers
  // ============================================================================

  private async handleBounds(url: URL): Promise<DispatchResult> {
    const validation = boundsSchema.safeParse(Object.fromEntries(url.searchParams.entries()));
    if (!validation.success) {
      return this.invalid('Invalid viewport bounds', validation.error.flatten());
    }
    return this.ok(await this.queryService.withinBounds(validation.data));
  }

  private async handleNearest(url: URL): Promise<DispatchResult> {
    const validation = centerSchema.safeParse(Object.fromEntries(url.searchParams.entries()));
    if (!validation.success) {
      return this.invalid('Invalid center', validation.error.flatten());
    }
    return this.ok(await this.queryService.nearest(validation.data));
  }

  private async handleRestroomById(rawId: string): Promise<DispatchResult> {
    const validation = idSchema.safeParse(rawId);
    if (!validation.success) {
      return this.invalid('Invalid restroom id', validation.error.flatten());
    }

    const restroom = await this.queryService.getRestroom(validation.data);
    if (!restroom) {
      return this.notFound('RESTROOM_NOT_FOUND', `Restroom not found: ${validation.data}`);
    }
    return this.ok(restroom);
  }

  private async handlePlaceSearch(url: URL): Promise<DispatchResult> {
    const validation = placeSearchSchema.safeParse({ q: url.searchParams.get('q') ?? '' });
    if (!validation.success) {
      return this.invalid('Invalid place query', validation.error.flatten());
    }
    return this.ok(await this.queryService.searchPlaces(validation.data.q));
  }

  private async handlePlaceBySlug(rawSlug: string): Promise<DispatchResult> {
    const validation = slugSchema.safeParse(rawSlug);
    if (!validation.success) {
      return this.invalid('Invalid place slug', validation.error.flatten());
    }

    const place = await this.queryService.resolvePlace(validation.data);
    if (!place) {
      return this.notFound('PLACE_NOT_FOUND', `Place not found: ${validation.data}`);
    }
    return this.ok(place);
  }

  private async handleHealth(): Promise<DispatchResult> {
    return this.ok({
      status: 'ok',
      restrooms: await this.store.count(),
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
    });
  }

  // ============================================================================
  // Responses
  // ============================================================================

  private ok<T>(data: T): DispatchResult {
    return { status: 200, body: { success: true, data, meta: emptyMeta() } };
  }

  private invalid(message: string, details: unknown): DispatchResult {
    return {
      status: 400,
      body: { success: false, error: { code: 'INVALID_PARAMETERS', message, details }, meta: emptyMeta() },
    };
  }

  private notFound(code: string, message: string): DispatchResult {
    return { status: 404, body: { success: false, error: { code, message }, meta: emptyMeta() } };
  }

  private failure(
    status: number,
    code: string,
    message: string,
    requestId: string,
    latencyMs: number
  ): DispatchResult {
    return {
      status,
      body: {
        success: false,
        error: { code, message },
        meta: { requestId, latencyMs: Math.round(latencyMs * 100) / 100, version: API_VERSION },
      },
    };
  }

  private setHeaders(res: ServerResponse, requestId: string): void {
    const origin = this.corsOrigins.includes('*') ? '*' : (this.corsOrigins[0] ?? '*');
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-ID');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Cache-Control', 'public, max-age=60');
    res.setHeader('X-Request-ID', requestId);
    res.setHeader('X-API-Version', API_VERSION);
  }
}

/** Placeholder replaced by `dispatch` once the request id and latency are known */
function emptyMeta(): APIResponse<unknown>['meta'] {
  return { requestId: '', latencyMs: 0, version: API_VERSION };
}
