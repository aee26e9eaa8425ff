import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { InvalidInputError } from '../../../lib/errors/CrudError';
import {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  normalizePageRequest,
} from '../../../lib/query/pagination';
import type { PageRequest, QueryValues } from '../../../lib/query/types';
import { PageQueryDto } from '../dto/PageQuery.request.dto';

/**
 * Read page/size from a query mapping. Absent values take the defaults,
 * non-integers are rejected, out-of-range integers are clamped.
 */
export function parsePageQuery(values: QueryValues): PageRequest {
  const dto = plainToInstance(PageQueryDto, {
    page: values.page?.[0],
    size: values.size?.[0],
  });

  const errors = validateSync(dto);
  if (errors.length > 0) {
    const details: Record<string, string> = {};
    for (const e of errors) {
      details[e.property] = Object.values(e.constraints ?? {}).join('; ');
    }
    throw new InvalidInputError(Object.values(details).join('; '), details);
  }

  return normalizePageRequest(dto.page ?? DEFAULT_PAGE, dto.size ?? DEFAULT_PAGE_SIZE);
}
