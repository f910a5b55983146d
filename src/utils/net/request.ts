import type { Request } from 'express';
import type { z } from 'zod';
import { isSchemeId, SCHEME_IDS } from '../../data/scheme/scheme';
import type { SchemeId } from '../../data/scheme/types';
import { loadSchemeRules } from '../io/schemeRules';
import { ValidationError } from '../validate/errors';
import type { DefaultData, RequestData } from './types';

/**
 * Extracts selected schemes from request query parameters
 * @param request - Express request object
 * @param defaultSchemes - Schemes to use if none specified
 * @returns Scheme identifiers from a comma-separated query string or the default
 * @throws ValidationError on `schemes` when an identifier is unknown
 */
export function getSelectedSchemes(request: Request, defaultSchemes: SchemeId[]): SchemeId[] {
  const raw = request.query.schemes;
  if (typeof raw !== 'string' || raw.trim() === '') {
    return defaultSchemes;
  }
  return raw.split(',').map((value) => {
    const id = value.trim();
    if (!isSchemeId(id)) {
      throw new ValidationError('schemes', `Unknown pension scheme: ${id}`);
    }
    return id;
  });
}

/**
 * Parses the request body, accepting JSON sent as a raw string
 */
export function getBody(request: Request): unknown {
  const body: unknown = request.body;
  if (typeof body !== 'string') {
    return body;
  }
  try {
    return JSON.parse(body);
  } catch {
    throw new ValidationError('body', 'Request body is not valid JSON');
  }
}

/**
 * Request data parser shared by the route handlers
 * @param request - Express request object containing query parameters and body
 * @param defaults - Default values for extractable parameters
 * @returns Parsed parameters, the body and the scheme rules
 */
export function getData(request: Request, defaults: Partial<DefaultData> = {}): RequestData {
  const fullDefaults: DefaultData = {
    defaultSchemes: [...SCHEME_IDS],
    ...defaults,
  };

  return {
    schemes: getSelectedSchemes(request, fullDefaults.defaultSchemes),
    data: getBody(request),
    rules: loadSchemeRules(),
  };
}

/**
 * Validates a request body against a schema
 * @throws ValidationError naming the first offending body field
 */
export function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue.path.map(String).join('.') || 'body';
    throw new ValidationError(field, `Invalid ${field}: ${issue.message}`);
  }
  return parsed.data;
}
