import { STATUS_CODES } from 'node:http';
import type { NextFunction, Request, Response } from 'express';
import * as logger from 'firebase-functions/logger';
import { AppError, describeError, ValidationError } from '../errors';

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof AppError) {
    res.status(error.status).json({
      error: STATUS_CODES[error.status] ?? 'Error',
      message: error.message,
      code: error.code,
    });
    return;
  }

  logger.error(context, { error: describeError(error) });
  res.status(500).json({
    error: 'Internal Server Error',
    message: describeError(error),
  });
}

/** Terminal error middleware for errors passed to `next`, including malformed JSON bodies. */
export function handleErrors(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof SyntaxError) {
    sendError(res, new ValidationError('Request body is not valid JSON'), 'Malformed body');
    return;
  }
  sendError(res, error, 'Unhandled request error');
}

export function readQueryString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseInteger(raw: string, name: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new ValidationError(`${name} must be an integer`);
  }
  return Number.parseInt(raw, 10);
}

export interface PageParams {
  limit: number;
  offset: number;
}

/** Negative values pass through so `paginate` can reject them. */
export function parsePageParams(query: Request['query']): PageParams {
  const rawLimit = readQueryString(query.limit);
  const rawOffset = readQueryString(query.offset);
  const limit = rawLimit === undefined ? DEFAULT_PAGE_LIMIT : parseInteger(rawLimit, 'limit');
  const offset = rawOffset === undefined ? 0 : parseInteger(rawOffset, 'offset');

  if (limit > MAX_PAGE_LIMIT) {
    throw new ValidationError(`limit must be at most ${MAX_PAGE_LIMIT}`);
  }
  return { limit, offset };
}

export function parseEventId(value: string | undefined): number {
  const raw = value?.trim() ?? '';
  if (!/^\d+$/.test(raw) || Number.parseInt(raw, 10) <= 0) {
    throw new ValidationError('eventId must be a positive integer');
  }
  return Number.parseInt(raw, 10);
}

export function parsePositiveNumber(value: unknown, name: string): number | undefined {
  const raw = readQueryString(value);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ValidationError(`${name} must be a positive number`);
  }
  return parsed;
}

export function requireBodyObject(body: unknown): Record<string, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

export function optionalString(record: Record<string, unknown>, field: string): string | null {
  const value = record[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function optionalCoordinate(record: Record<string, unknown>, field: 'latitude' | 'longitude'): number | null {
  const value = record[field];
  if (value === undefined || value === null) {
    return null;
  }
  const bound = field === 'latitude' ? 90 : 180;
  if (typeof value !== 'number' || !Number.isFinite(value) || Math.abs(value) > bound) {
    throw new ValidationError(`${field} must be a number between -${bound} and ${bound}`);
  }
  return value;
}
