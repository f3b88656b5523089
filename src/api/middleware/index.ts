import compression from 'compression';
import cors from 'cors';
import { PageQuery } from '../../types';
import { RequestValidationError } from '../../types/errors';

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

// CORS middleware
export const corsMiddleware = cors({
  origin: '*',
  methods: ['GET', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin'],
  optionsSuccessStatus: 204
});

// Compression middleware
export const compressionMiddleware = compression();

export interface PaginatedResponse<T> {
  data: T[];
  metadata: {
    currentPage: number;
    totalPages: number;
    totalItems: number;
    itemsPerPage: number;
  };
  timestamp: number;
}

/**
 * Positive integer query parameter; `fallback` when absent.
 */
export function parsePositiveInt(value: unknown, name: string, fallback: number, max?: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new RequestValidationError(`${name} must be a positive integer`, { [name]: value });
  }
  return max !== undefined ? Math.min(parsed, max) : parsed;
}

export function parsePageQuery(query: Record<string, unknown>): PageQuery {
  return {
    page: parsePositiveInt(query.page, 'page', 1),
    limit: parsePositiveInt(query.limit, 'limit', DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT)
  };
}

// Helper function to format paginated response
export const formatPaginatedResponse = <T>(
  data: T[],
  totalItems: number,
  page: number,
  limit: number,
  now: () => number = Date.now
): PaginatedResponse<T> => {
  return {
    data,
    metadata: {
      currentPage: page,
      totalPages: Math.ceil(totalItems / limit),
      totalItems,
      itemsPerPage: limit
    },
    timestamp: now()
  };
};
