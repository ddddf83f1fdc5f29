export type PaginationInput = {
  page?: unknown;
  pageSize?: unknown;
};

export type PaginationDefaults = {
  page?: number;
  pageSize?: number;
  maxPageSize?: number;
};

export type Page<T> = {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
};

function positiveInt(value: unknown, fallback: number) {
  const parsed = Number(value ?? fallback);
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : fallback;
}

export function paginate<T>(
  items: readonly T[],
  input: PaginationInput,
  defaults: PaginationDefaults = {}
): Page<T> {
  const maxPageSize = defaults.maxPageSize ?? 200;
  const page = positiveInt(input.page, defaults.page ?? 1);
  const pageSize = Math.min(positiveInt(input.pageSize, defaults.pageSize ?? 50), maxPageSize);
  const offset = (page - 1) * pageSize;

  return {
    items: items.slice(offset, offset + pageSize),
    total: items.length,
    page,
    pageSize,
  };
}
