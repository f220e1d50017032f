export type SortOrder = 'ASC' | 'DESC';

export interface PageRequest<TSortField extends string = string> {
  page: number;
  limit: number;
  sortBy: TSortField;
  sortOrder: SortOrder;
}

export interface PaginatedResponse<T> {
  data: T[];
  meta: {
    total: number;
    page: number;
    limit: number;
    totalPages: number;
  };
}
