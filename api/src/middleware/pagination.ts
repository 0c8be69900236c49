import type { Request } from 'express';
import type { ChangeCursor } from '../store/types';
import type { PaginationResult } from '../types';

export interface PaginationParams {
  limit: number;
  cursor: ChangeCursor | null;
}

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 500;

function isCursor(value: unknown): value is ChangeCursor {
  return typeof value === 'object' && value !== null
    && 'id' in value && typeof value.id === 'string'
    && 'created_at' in value && typeof value.created_at === 'string';
}

export function parsePagination(req: Request): PaginationParams {
  const limitParam = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
  const limit = isNaN(limitParam) ? DEFAULT_LIMIT : Math.min(Math.max(limitParam, 1), MAX_LIMIT);

  let cursor: PaginationParams['cursor'] = null;
  const cursorParam = req.query.cursor;
  if (typeof cursorParam === 'string' && cursorParam) {
    try {
      const decoded = Buffer.from(cursorParam, 'base64').toString('utf8');
      const parsed: unknown = JSON.parse(decoded);
      if (isCursor(parsed)) {
        cursor = { id: parsed.id, created_at: parsed.created_at };
      }
    } catch {
      // undecodable cursor: start from the first page
    }
  }

  return { limit, cursor };
}

export function encodeCursor(id: string, created_at: string): string {
  return Buffer.from(JSON.stringify({ id, created_at })).toString('base64');
}

/** Expects `limit + 1` rows; the extra row only signals another page. */
export function buildPaginationResponse<T extends ChangeCursor>(
  data: T[],
  limit: number,
  totalCount: number,
): { data: T[]; pagination: PaginationResult } {
  const hasMore = data.length > limit;
  const items = hasMore ? data.slice(0, limit) : data;
  const lastItem = items[items.length - 1];

  return {
    data: items,
    pagination: {
      has_more: hasMore,
      next_cursor: hasMore && lastItem ? encodeCursor(lastItem.id, lastItem.created_at) : null,
      total_count: totalCount,
    },
  };
}
