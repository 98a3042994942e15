import { ValidationError } from '../errors';

export interface Page<T> {
  total: number;
  limit: number;
  offset: number;
  items: T[];
}

export function paginate<T>(items: readonly T[], limit: number, offset: number): Page<T> {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError('limit must be a non-negative integer');
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError('offset must be a non-negative integer');
  }

  return {
    total: items.length,
    limit,
    offset,
    items: items.slice(offset, offset + limit),
  };
}
