import type { Page } from "@eventfolio/shared";

export interface PageRequest {
  page: number;
  pageSize: number;
}

export function pageOffset(request: PageRequest) {
  return (request.page - 1) * request.pageSize;
}

export function toPage<T>(items: T[], total: number, request: PageRequest): Page<T> {
  return {
    items,
    total,
    page: request.page,
    pageSize: request.pageSize,
    hasMore: pageOffset(request) + items.length < total
  };
}
