import { Type } from 'class-transformer';
import { IsInt, IsOptional } from 'class-validator';

// Pagination part of a list query; every other key is a filter or order
// directive and is read from the raw query.
export class PageQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'page must be an integer' })
  public readonly page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'size must be an integer' })
  public readonly size?: number;
}
