import { AppError } from "../utils/errors";
import { Pagination } from "../types/crm";
import { isPresent } from "./compose";

export type SortDirection = 1 | -1;
export type SortSpec = Record<string, SortDirection>;

export interface ListOptions {
  sort: SortSpec;
  skip: number;
  limit: number;
}

/**
 * Parses `orderBy` ("name", "-createdAt") against the sortable fields.
 * The id is always appended so pages are stable.
 */
export const parseOrderBy = (
  orderBy: string | undefined,
  allowed: readonly string[],
  fallback: SortSpec
): SortSpec => {
  if (!isPresent(orderBy)) {
    return { ...fallback, _id: 1 };
  }

  const descending = orderBy.startsWith("-");
  const field = descending ? orderBy.slice(1) : orderBy;

  if (!allowed.includes(field)) {
    throw AppError.validation([
      {
        field: "orderBy",
        message: `Cannot sort by "${field}". Choose one of: ${allowed.join(", ")}`,
      },
    ]);
  }

  return { [field]: descending ? -1 : 1, _id: 1 };
};

export const toListOptions = (sort: SortSpec, page: number, limit: number): ListOptions => ({
  sort,
  skip: (page - 1) * limit,
  limit,
});

export const buildPagination = (page: number, limit: number, total: number): Pagination => ({
  page,
  limit,
  total,
  pages: Math.ceil(total / limit),
});
