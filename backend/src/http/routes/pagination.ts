import type { Page, PageRequest } from "../../utils/pagination.js";

export function pageRequest(page: number, pageSize: number | undefined, defaultSize: number): PageRequest {
  return { page, pageSize: pageSize ?? defaultSize };
}

/** Renders a page as `{ [key]: items, pagination }`. */
export function pageBody<T>(key: string, page: Page<T>): Record<string, unknown> {
  const { items, ...pagination } = page;
  return { [key]: items, pagination };
}
