/**
 * HTTP utility functions for the API server
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { isSimulationError, ValidationFailure, type SimulationErrorCode } from '../../core/errors.js';

const STATUS_BY_CODE: Record<SimulationErrorCode, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  PERSISTENCE: 503,
};

/**
 * Send a JSON response with the given status code and payload
 */
export function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(payload));
}

/**
 * Send an error response with the given status code and message
 */
export function sendError(res: ServerResponse, status: number, message: string): void {
  sendJson(res, status, { error: message });
}

/**
 * Map a thrown error onto a response: simulation errors keep their message,
 * anything else is logged and reported as a generic 500
 */
export function sendFailure(res: ServerResponse, error: unknown): void {
  if (res.headersSent) {
    console.error('[Server] Error after response started:', error);
    res.end();
    return;
  }

  if (isSimulationError(error)) {
    if (error.code === 'PERSISTENCE') {
      console.error('[Server] Store failure:', error.message);
    }
    sendJson(res, STATUS_BY_CODE[error.code], { error: error.message, code: error.code });
    return;
  }

  console.error('[Server] Unhandled error:', error);
  sendError(res, 500, 'Internal server error');
}

/**
 * Parse JSON body from an incoming request
 * Returns null if parsing fails or body is empty
 */
export function parseJsonBody<T = unknown>(req: IncomingMessage): Promise<T | null> {
  return new Promise((resolve) => {
    let body = '';
    req.on('data', (chunk) => {
      body += chunk.toString();
    });
    req.on('end', () => {
      if (!body) {
        resolve(null);
        return;
      }
      try {
        resolve(JSON.parse(body) as T);
      } catch {
        resolve(null);
      }
    });
    req.on('error', () => {
      resolve(null);
    });
  });
}

/**
 * Set CORS headers on a response
 */
export function setCorsHeaders(res: ServerResponse): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

/**
 * Handle CORS preflight request
 * Returns true if this was a preflight request and it was handled
 */
export function handleCorsPreflightIfNeeded(req: IncomingMessage, res: ServerResponse): boolean {
  if (req.method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    return true;
  }
  return false;
}

/**
 * Parse the optional `speed` query parameter
 * Returns undefined when absent; throws ValidationFailure when present but not a number
 */
export function parseSpeedParam(value: string | null): number | undefined {
  if (value === null) return undefined;

  const speed = value.trim() === '' ? NaN : Number(value);
  if (Number.isNaN(speed)) {
    throw new ValidationFailure(`Invalid speed '${value}'`);
  }
  return speed;
}

/**
 * Extract path parameters from a URL pathname using a pattern
 * Pattern uses :param syntax, e.g., '/api/boats/:id'
 * Returns null if the pattern doesn't match
 */
export function matchPath(
  pathname: string,
  pattern: string
): Record<string, string> | null {
  const patternParts = pattern.split('/');
  const pathParts = pathname.split('/');

  if (patternParts.length !== pathParts.length) {
    return null;
  }

  const params: Record<string, string> = {};

  for (let i = 0; i < patternParts.length; i++) {
    const patternPart = patternParts[i];
    const pathPart = pathParts[i];

    if (patternPart.startsWith(':')) {
      params[patternPart.slice(1)] = decodeURIComponent(pathPart);
    } else if (patternPart !== pathPart) {
      return null;
    }
  }

  return params;
}
