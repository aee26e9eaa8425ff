export interface ListRecordsResponseDto<T> {
  list: T[];
  page: number;
  size: number;
  total: number;
}
