/**
 * OAuth2 Resource Server
 *
 * Verifies bearer JWTs against the issuer's JWKS and attaches the resulting
 * principal to the request and to RequestContext. Everything except the
 * public paths requires a valid token.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { createRemoteJWKSet, jwtVerify, type JWTPayload, type JWTVerifyGetKey } from 'jose';
import { z } from 'zod';
import config, { ConfigurationError } from '../../config/env.js';
import defaultLogger, { type Logger } from '../../infra/logger/logger.js';
import { RequestContext, type Principal } from '../../shared/context/RequestContext.js';
import { matchesAny } from '../../shared/utils/pathMatcher.js';
import { splitUrl } from './contentLogging.js';

export const DEFAULT_PUBLIC_PATHS = ['/health', '/health/**', '/ready'];
export const DEFAULT_ALLOWED_TOKEN_TYPES = ['JWT', 'at+jwt'];

const AUTHENTICATION_REQUIRED = 'Full authentication is required to access this resource';
const BEARER_PATTERN = /^bearer\s+(.*)$/i;
const TOKEN_PREVIEW_LENGTH = 50;

declare module 'fastify' {
  interface FastifyRequest {
    principal?: Principal;
  }
}

export interface OAuth2ResourceServerOptions {
  /** Expected `iss`; also the base for OIDC discovery */
  issuer?: string;
  /** Value the `aud` claim must contain */
  audience?: string;
  /** JWKS endpoint; skips discovery when set */
  jwksUri?: string;
  /** Key resolver used instead of any remote JWKS */
  keyResolver?: JWTVerifyGetKey;
  clockToleranceSec?: number;
  publicPaths?: string[];
  allowedTokenTypes?: string[];
  logger?: Logger;
}

/**
 * Rejected bearer token or missing credentials
 */
export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

const openIdConfigurationSchema = z.object({
  issuer: z.string().optional(),
  jwks_uri: z.string().url(),
});

/**
 * Fetch `{issuer}/.well-known/openid-configuration` and return its jwks_uri
 */
export async function discoverJwksUri(issuer: string): Promise<string> {
  const url = `${issuer.replace(/\/+$/, '')}/.well-known/openid-configuration`;
  const response = await fetch(url);

  if (!response.ok) {
    throw new AuthenticationError(
      `Unable to load OpenID configuration from ${url}: HTTP ${response.status}`
    );
  }

  const document = openIdConfigurationSchema.parse(await response.json());
  return document.jwks_uri;
}

/**
 * Resolve verification keys from, in order: an explicit resolver, a JWKS URI,
 * or the issuer's discovery document (fetched on first use and retried after failure)
 */
export function createKeyResolver(options: OAuth2ResourceServerOptions, log: Logger): JWTVerifyGetKey {
  if (options.keyResolver) {
    return options.keyResolver;
  }

  if (options.jwksUri) {
    return createRemoteJWKSet(new URL(options.jwksUri));
  }

  const issuer = options.issuer;
  if (!issuer) {
    throw new ConfigurationError('OAuth2 resource server requires an issuer, a JWKS URI or a key resolver', [
      'OAUTH2_ISSUER_URI',
      'OAUTH2_JWKS_URI',
    ]);
  }

  let pending: Promise<JWTVerifyGetKey> | undefined;

  return async (protectedHeader, token) => {
    if (!pending) {
      pending = discoverJwksUri(issuer)
        .then((jwksUri) => {
          log.info({ issuer, jwksUri }, 'Discovered JWKS endpoint');
          return createRemoteJWKSet(new URL(jwksUri));
        })
        .catch((error: unknown) => {
          pending = undefined;
          throw error;
        });
    }

    const jwks = await pending;
    return jwks(protectedHeader, token);
  };
}

function normalizeTokenType(type: string): string {
  const lower = type.toLowerCase();
  return lower.startsWith('application/') ? lower.slice('application/'.length) : lower;
}

/**
 * Map the `scope` claim to `SCOPE_` authorities
 */
export function extractAuthorities(claims: JWTPayload): string[] {
  const raw = claims.scope;
  let scopes: string[] = [];

  if (typeof raw === 'string') {
    scopes = raw.split(/\s+/);
  } else if (Array.isArray(raw)) {
    scopes = raw.filter((scope): scope is string => typeof scope === 'string');
  }

  return scopes.filter((scope) => scope.length > 0).map((scope) => `SCOPE_${scope}`);
}

export function validateAudience(audience: string | string[] | undefined, expected: string): void {
  const audiences = audience === undefined ? [] : Array.isArray(audience) ? audience : [audience];

  if (audiences.length === 0) {
    throw new AuthenticationError('Token must have an audience');
  }

  if (!audiences.includes(expected)) {
    throw new AuthenticationError('Token audience does not match');
  }
}

/**
 * Build a verifier turning a raw token into a principal
 */
export function createTokenVerifier(
  options: OAuth2ResourceServerOptions,
  log: Logger
): (token: string) => Promise<Principal> {
  const audience = options.audience ?? config.OAUTH2_AUDIENCE;
  const clockTolerance = options.clockToleranceSec ?? config.OAUTH2_CLOCK_TOLERANCE_SEC;
  const allowedTypes = new Set((options.allowedTokenTypes ?? DEFAULT_ALLOWED_TOKEN_TYPES).map(normalizeTokenType));
  const keyResolver = createKeyResolver(options, log);

  return async (token: string): Promise<Principal> => {
    const { payload, protectedHeader } = await jwtVerify(token, keyResolver, {
      issuer: options.issuer,
      clockTolerance,
    });

    if (!protectedHeader.typ || !allowedTypes.has(normalizeTokenType(protectedHeader.typ))) {
      throw new AuthenticationError(`Unsupported token type: ${protectedHeader.typ ?? 'none'}`);
    }

    validateAudience(payload.aud, audience);

    log.debug(
      {
        issuer: payload.iss,
        audience: payload.aud,
        subject: payload.sub,
        algorithm: protectedHeader.alg,
        kid: protectedHeader.kid,
      },
      'JWT validation successful'
    );

    return {
      subject: payload.sub ?? '',
      authorities: extractAuthorities(payload),
      claims: { ...payload },
    };
  };
}

/**
 * Token of a `Bearer` Authorization header; the scheme is case-insensitive
 */
function bearerToken(header: string | undefined): string | undefined {
  const match = header === undefined ? null : BEARER_PATTERN.exec(header);
  return match ? match[1] : undefined;
}

function extractBearerToken(header: string | undefined): string {
  const token = bearerToken(header)?.trim();
  if (!token) {
    throw new AuthenticationError(AUTHENTICATION_REQUIRED);
  }
  return token;
}

function logAuthenticationFailure(log: Logger, request: FastifyRequest, error: unknown): void {
  const header = request.headers.authorization;
  const token = bearerToken(header);
  const hasBearerPrefix = token !== undefined;
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause : undefined;

  log.warn(
    {
      uri: splitUrl(request.url).path,
      authorizationHeaderPresent: header !== undefined,
      bearerPrefix: header === undefined ? undefined : hasBearerPrefix,
      tokenLength: token?.length,
      tokenPreview: token === undefined ? undefined : `${token.slice(0, TOKEN_PREVIEW_LENGTH)}...`,
      errorType: error instanceof Error ? error.name : typeof error,
      cause: cause?.message,
    },
    `Authentication failed: ${error instanceof Error ? error.message : String(error)}`
  );
}

function sendUnauthorized(reply: FastifyReply, message: string): FastifyReply {
  return reply.code(401).header('WWW-Authenticate', 'Bearer').send({ error: 'Unauthorized', message });
}

/**
 * Register the OAuth2 resource server hook
 */
export function registerOAuth2ResourceServer(
  fastify: FastifyInstance,
  options: OAuth2ResourceServerOptions = {}
): void {
  const log = options.logger ?? defaultLogger;
  const resolved: OAuth2ResourceServerOptions = {
    ...options,
    issuer: options.issuer ?? config.OAUTH2_ISSUER_URI,
    jwksUri: options.jwksUri ?? config.OAUTH2_JWKS_URI,
  };
  const publicPaths = options.publicPaths ?? DEFAULT_PUBLIC_PATHS;
  const verify = createTokenVerifier(resolved, log);

  log.info(
    {
      issuer: resolved.issuer,
      audience: resolved.audience ?? config.OAUTH2_AUDIENCE,
      jwksUri: resolved.jwksUri,
      publicPaths,
    },
    'OAuth2 resource server configured'
  );

  fastify.addHook('onRequest', async (request, reply) => {
    if (matchesAny(publicPaths, splitUrl(request.url).path)) {
      return;
    }

    try {
      const token = extractBearerToken(request.headers.authorization);
      const principal = await verify(token);
      request.principal = principal;
      RequestContext.setPrincipal(principal);
    } catch (error) {
      logAuthenticationFailure(log, request, error);
      const message = error instanceof Error ? error.message : 'Invalid token';
      return sendUnauthorized(reply, message);
    }
  });

  // Open a context for the handler when the correlation hook has not
  fastify.addHook('preHandler', (request, _reply, done) => {
    const principal = request.principal;
    if (!principal || RequestContext.getPrincipal() === principal) {
      done();
      return;
    }

    const context = RequestContext.get();
    if (context) {
      context.principal = principal;
      done();
      return;
    }

    RequestContext.run({ correlationId: String(request.id), principal }, () => {
      done();
    });
  });
}

/**
 * Route preHandler requiring at least one of the given scopes
 *
 * @example
 * fastify.get('/reports', { preHandler: requireScopes('reports:read') }, handler);
 */
export function requireScopes(...scopes: string[]) {
  const required = scopes.map((scope) => (scope.startsWith('SCOPE_') ? scope : `SCOPE_${scope}`));

  return async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    const principal = request.principal;

    if (!principal) {
      return sendUnauthorized(reply, AUTHENTICATION_REQUIRED);
    }

    if (!required.some((authority) => principal.authorities.includes(authority))) {
      return reply.code(403).send({ error: 'Forbidden', message: 'Insufficient scope' });
    }

    return undefined;
  };
}
