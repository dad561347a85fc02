import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyResultV2,
  Context,
} from 'aws-lambda';
import { ZodError } from 'zod';
import type { ApiError, HealthResponse, SessionState } from '@orgld/shared';
import { config } from '../lib/config.js';
import { createRequestLogger, type Logger } from '../lib/logger.js';
import { AppError, ValidationError } from '../lib/errors.js';
import { Trace } from '../lib/trace.js';

// Services
import * as sessionService from '../lib/services/sessions.js';
import * as profileService from '../lib/services/profile.js';
import * as exportService from '../lib/services/exports.js';
import { login, requireAuthenticated } from '../lib/services/auth.js';
import { applyManualEdit, applySocialLinks, clearParentLinkage } from '../lib/services/entity-record.js';

// Validation schemas
import {
  loginSchema,
  registryCompanySchema,
  resolveParentSchema,
  searchQuerySchema,
  selectKnowledgeBaseSchema,
  ulidSchema,
  updateRecordSchema,
  updateSocialLinksSchema,
} from '../lib/validation.js';

// Route handler type
type RouteHandler = (
  event: APIGatewayProxyEventV2,
  context: HandlerContext
) => Promise<APIGatewayProxyResultV2>;

interface HandlerContext {
  requestId: string;
  logger: Logger;
}

// Work done on a loaded session; the session is saved afterwards
type SessionHandler = (
  session: SessionState,
  trace: Trace,
  event: APIGatewayProxyEventV2
) => Promise<{ statusCode?: number; body?: Record<string, unknown> }>;

// Parse path parameters
function getPathParam(event: APIGatewayProxyEventV2, name: string): string {
  return event.pathParameters?.[name] || '';
}

// Parse query parameters
function getQueryParams(event: APIGatewayProxyEventV2): Record<string, string> {
  const params = event.queryStringParameters || {};
  // Filter out undefined values
  return Object.fromEntries(
    Object.entries(params).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
}

// Parse JSON body
function parseBody(event: APIGatewayProxyEventV2): unknown {
  if (!event.body) {
    throw new ValidationError('Request body is required');
  }
  try {
    return JSON.parse(event.isBase64Encoded
      ? Buffer.from(event.body, 'base64').toString('utf-8')
      : event.body);
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

// Body is optional for some POST routes
function parseOptionalBody(event: APIGatewayProxyEventV2): unknown {
  return event.body ? parseBody(event) : {};
}

// Create JSON response
function jsonResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>
): APIGatewayProxyResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

/**
 * Load the session named in the path, check the gate, run the work and
 * persist the result. The response carries the updated session view.
 */
function sessionRoute(handler: SessionHandler, options: { requireAuth: boolean }): RouteHandler {
  return async (event, ctx) => {
    const sessionId = ulidSchema.parse(getPathParam(event, 'sessionId'));
    const session = await sessionService.getSession(sessionId);
    if (options.requireAuth) {
      requireAuthenticated(session);
    }

    const trace = new Trace(session.trace, config.session.traceLimit, ctx.logger.child({ sessionId }));
    let result: Awaited<ReturnType<SessionHandler>>;
    try {
      result = await handler(session, trace, event);
    } catch (error) {
      // Keep the trace of a failed operation, then report the failure
      await sessionService.saveSession(session, trace);
      throw error;
    }
    const saved = await sessionService.saveSession(session, trace);

    return jsonResponse(result.statusCode ?? 200, {
      session: sessionService.toSessionView(saved, trace),
      ...result.body,
    });
  };
}

const authed = (handler: SessionHandler) => sessionRoute(handler, { requireAuth: true });

// Route definitions
const routes: Record<string, RouteHandler> = {
  'GET /health': async () => {
    const response: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.version,
    };
    return jsonResponse(200, response);
  },

  // Sessions
  'POST /sessions': async (_event, ctx) => {
    const session = await sessionService.createSession();
    ctx.logger.info({ sessionId: session.sessionId }, 'Session created');
    const trace = new Trace(session.trace, config.session.traceLimit, ctx.logger);
    return jsonResponse(201, { session: sessionService.toSessionView(session, trace) });
  },
  'POST /sessions/{sessionId}/login': sessionRoute(
    async (session, trace, event) => {
      const input = loginSchema.parse(parseBody(event));
      await login(session, input.password, trace);
      return {};
    },
    { requireAuth: false }
  ),
  'GET /sessions/{sessionId}': authed(async () => ({})),
  'POST /sessions/{sessionId}/reset': authed(async (session, trace) => {
    sessionService.resetSession(session, trace);
    return {};
  }),

  // Manual edits
  'PUT /sessions/{sessionId}/record': authed(async (session, trace, event) => {
    const input = updateRecordSchema.parse(parseBody(event));
    applyManualEdit(session.record, input);
    trace.info(`Edited: ${Object.keys(input).join(', ') || 'nothing'}`);
    return {};
  }),
  'PUT /sessions/{sessionId}/social-links': authed(async (session, trace, event) => {
    const input = updateSocialLinksSchema.parse(parseBody(event));
    applySocialLinks(session.socialLinks, input);
    trace.info('Social links updated');
    return {};
  }),
  'DELETE /sessions/{sessionId}/parent': authed(async (session, trace) => {
    clearParentLinkage(session.record);
    trace.info('Parent linkage cleared');
    return {};
  }),

  // Lookups
  'GET /sessions/{sessionId}/search': authed(async (_session, trace, event) => {
    const query = searchQuerySchema.parse(getQueryParams(event));
    const results = await profileService.search(query, trace);
    return { body: { results } };
  }),
  'POST /sessions/{sessionId}/select/knowledge-base': authed(async (session, trace, event) => {
    const input = selectKnowledgeBaseSchema.parse(parseBody(event));
    const outcome = await profileService.selectKnowledgeBaseEntity(session, input, trace);
    return { body: { outcome } };
  }),
  'POST /sessions/{sessionId}/select/registry': authed(async (session, trace, event) => {
    const company = registryCompanySchema.parse(parseBody(event));
    profileService.selectRegistryCompany(session, company, trace);
    return {};
  }),
  'POST /sessions/{sessionId}/resolve-parent': authed(async (session, trace, event) => {
    const input = resolveParentSchema.parse(parseOptionalBody(event));
    const outcome = await profileService.resolveParentForSession(session, input, trace);
    return { body: { outcome } };
  }),
  'POST /sessions/{sessionId}/enrich': authed(async (session, trace) => {
    const result = await profileService.enrichSession(session, trace);
    return { body: result };
  }),

  // Output
  'GET /sessions/{sessionId}/jsonld': authed(async (session) => {
    const rendered = profileService.renderJsonLd(session);
    return { body: { ...rendered } };
  }),
  'POST /sessions/{sessionId}/exports': authed(async (session, trace) => {
    const files = await exportService.exportSession(session, trace);
    return { statusCode: 201, body: { files } };
  }),
  'POST /sessions/{sessionId}/import': authed(async (session, trace, event) => {
    const snapshot = exportService.parseConfigSnapshot(parseBody(event));
    sessionService.replaceProfile(session, snapshot.record, snapshot.socialLinks);
    trace.ok(`Config loaded: ${snapshot.record.name || 'unnamed'}`);
    return {};
  }),
};

// Match route to handler
function matchRoute(
  method: string,
  path: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  const routeKey = `${method} ${path}`;

  // Direct match
  const direct = routes[routeKey];
  if (direct) {
    return { handler: direct, params: {} };
  }

  // Pattern matching with path parameters
  for (const [pattern, handler] of Object.entries(routes)) {
    const [patternMethod, patternPath] = pattern.split(' ');
    if (patternMethod !== method) continue;

    const patternParts = patternPath.split('/');
    const pathParts = path.split('/');

    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    let matches = true;

    for (let i = 0; i < patternParts.length; i++) {
      if (patternParts[i].startsWith('{') && patternParts[i].endsWith('}')) {
        const paramName = patternParts[i].slice(1, -1);
        params[paramName] = pathParts[i];
      } else if (patternParts[i] !== pathParts[i]) {
        matches = false;
        break;
      }
    }

    if (matches) {
      return { handler, params };
    }
  }

  return null;
}

// Main handler
export async function handler(
  event: APIGatewayProxyEventV2,
  _context: Context
): Promise<APIGatewayProxyResultV2> {
  const requestId = event.requestContext.requestId;
  const logger = createRequestLogger(requestId);
  const method = event.requestContext.http.method;
  const path = event.rawPath;

  logger.info({ method, path }, 'Request received');

  try {
    // Match route
    const match = matchRoute(method, path);

    if (!match) {
      return jsonResponse(404, {
        error: {
          code: 'NOT_FOUND',
          message: `Route not found: ${method} ${path}`,
          requestId,
        },
      });
    }

    // Inject path parameters
    event.pathParameters = { ...event.pathParameters, ...match.params };

    // Execute handler
    const response = await match.handler(event, { requestId, logger });

    // Log status code if available (response can be string for HTTP API format 2.0)
    const statusCode = typeof response === 'object' ? response.statusCode : undefined;
    logger.info({ statusCode }, 'Request completed');

    return response;
  } catch (error) {
    // Handle known errors
    if (error instanceof AppError) {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
      return jsonResponse(error.statusCode, error.toApiError(requestId));
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ errors: error.errors }, 'Validation error');
      const body: ApiError = {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          requestId,
          details: { issues: error.errors },
        },
      };
      return jsonResponse(400, body);
    }

    // Unknown errors
    logger.error({ error }, 'Unexpected error');
    return jsonResponse(500, {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId,
      },
    });
  }
}
