import { InfinityPaginationResponseDto } from './dto/infinity-pagination-response.dto';

export interface PaginationOptions {
  page: number;
  limit: number;
}

export const infinityPagination = <T>(
  data: T[],
  options: PaginationOptions,
  total: number,
): InfinityPaginationResponseDto<T> => {
  return {
    data,
    hasNextPage: options.page * options.limit < total,
    total,
  };
};
