/**
 * Content logging helpers for the HTTP logging hook.
 * Extract request/response metadata, mask sensitive headers and cap body size.
 */
import type { FastifyReply, FastifyRequest } from 'fastify';
import { toJson } from '../../shared/logging/SafeLogger.js';
import type { HttpLoggingProperties } from './httpLoggingProperties.js';

export const MASKED_VALUE = '********';

/**
 * Headers consulted, in order, to find the originating client address
 */
const CLIENT_IP_HEADERS = [
  'X-Forwarded-For',
  'Proxy-Client-IP',
  'WL-Proxy-Client-IP',
  'HTTP_X_FORWARDED_FOR',
  'HTTP_X_FORWARDED',
  'HTTP_X_CLUSTER_CLIENT_IP',
  'HTTP_CLIENT_IP',
  'HTTP_FORWARDED_FOR',
  'HTTP_FORWARDED',
  'HTTP_VIA',
  'REMOTE_ADDR',
];

export interface RequestDetails {
  method: string;
  uri: string;
  queryString?: string;
  clientIp?: string;
  headers?: Record<string, string>;
}

export interface ResponseDetails {
  status: number;
  headers?: Record<string, string>;
  durationMs?: number;
}

type HeaderValue = string | number | string[] | undefined;

function headerToString(value: HeaderValue): string | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(', ') : String(value);
}

function isSensitiveHeader(headerName: string, sensitiveHeaders: readonly string[]): boolean {
  const lowerName = headerName.toLowerCase();
  return sensitiveHeaders.some((sensitive) => sensitive.toLowerCase() === lowerName);
}

/**
 * Copy headers, replacing sensitive values with a fixed mask
 */
export function maskHeaders(
  headers: Record<string, HeaderValue>,
  sensitiveHeaders: readonly string[]
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    const text = headerToString(value);
    if (text === undefined) continue;
    result[name] = isSensitiveHeader(name, sensitiveHeaders) ? MASKED_VALUE : text;
  }

  return result;
}

export function splitUrl(url: string): { path: string; query?: string } {
  const index = url.indexOf('?');
  if (index === -1) {
    return { path: url };
  }
  const query = url.slice(index + 1);
  return { path: url.slice(0, index), query: query.length > 0 ? query : undefined };
}

/**
 * Resolve the client address, preferring proxy headers over the socket address.
 * X-Forwarded-For may hold a list; its first entry is the client.
 */
export function getClientIpAddress(request: FastifyRequest): string {
  for (const header of CLIENT_IP_HEADERS) {
    let ip = headerToString(request.headers[header.toLowerCase()]);
    if (ip && ip.length > 0 && ip.toLowerCase() !== 'unknown') {
      if (ip.includes(',')) {
        ip = ip.split(',')[0].trim();
      }
      return ip;
    }
  }

  return request.ip || 'unknown';
}

export function extractRequestDetails(
  request: FastifyRequest,
  properties: HttpLoggingProperties
): RequestDetails {
  const { path, query } = splitUrl(request.url);
  const details: RequestDetails = {
    method: request.method,
    uri: path,
  };

  if (properties.includeQueryParams && query !== undefined) {
    details.queryString = query;
  }

  if (properties.includeClientIp) {
    details.clientIp = getClientIpAddress(request);
  }

  if (properties.includeRequestHeaders) {
    details.headers = maskHeaders(request.headers, properties.sensitiveHeaders);
  }

  return details;
}

export function extractResponseDetails(
  reply: FastifyReply,
  properties: HttpLoggingProperties
): ResponseDetails {
  const details: ResponseDetails = {
    status: reply.statusCode,
  };

  if (properties.includeResponseHeaders) {
    details.headers = maskHeaders(reply.getHeaders(), properties.sensitiveHeaders);
  }

  return details;
}

/**
 * Decode a body for logging, truncated to maxSize bytes
 */
export function extractBody(content: Buffer | string, maxSize: number): string | undefined {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;

  if (buffer.length === 0) {
    return undefined;
  }

  if (buffer.length > maxSize) {
    const omitted = buffer.length - maxSize;
    return `${buffer.subarray(0, maxSize).toString('utf8')}... [TRUNCATED - ${omitted} bytes omitted]`;
  }

  return buffer.toString('utf8');
}

/**
 * Render a parsed request body or a reply payload as loggable content.
 * Streams and other non-serializable payloads are not captured.
 */
export function bodyContent(body: unknown): Buffer | string | undefined {
  if (body === undefined || body === null) return undefined;
  if (typeof body === 'string' || Buffer.isBuffer(body)) return body;
  if (typeof body === 'object' && 'pipe' in body) return undefined;
  return toJson(body);
}

export function formatLogMessage(prefix: string, details: RequestDetails | ResponseDetails): string {
  if ('method' in details) {
    return `${prefix} - ${details.method} ${details.uri}`;
  }
  return `${prefix} - Status: ${details.status}`;
}
