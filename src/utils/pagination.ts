export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

export interface PageRequest {
  page: number;
  page_size: number;
}

export interface PageWindow {
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  page_size: number;
}

/**
 * page/page_size are validated at the HTTP boundary (page >= 1,
 * 1 <= page_size <= MAX_PAGE_SIZE).
 */
export const toPageWindow = ({ page, page_size }: PageRequest): PageWindow => ({
  limit: page_size,
  offset: (page - 1) * page_size,
});

export const toPage = <T>(request: PageRequest, items: T[], total: number): Page<T> => ({
  items,
  total,
  page: request.page,
  page_size: request.page_size,
});
