import type { PageRequest } from './types';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;

/** Out-of-range values fall back to the defaults instead of failing. */
export function normalizePageRequest(page: number, size: number): PageRequest {
  return {
    page: Number.isSafeInteger(page) && page >= 1 ? page : DEFAULT_PAGE,
    size: Number.isSafeInteger(size) && size >= 1 ? size : DEFAULT_PAGE_SIZE,
  };
}

export function pageOffset({ page, size }: PageRequest): number {
  return (page - 1) * size;
}
