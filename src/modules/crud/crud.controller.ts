import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Inject,
  NotFoundException,
  Post,
  Query,
  type Type,
} from '@nestjs/common';
import { InvalidInputError, RecordNotFoundError } from '../../lib/errors/CrudError';
import { extractQueryDirectives, toQueryValues } from '../../lib/query/filter.grammar';
import { resolveOrder } from '../../lib/query/order.resolver';
import type { ResourceSchema } from '../../lib/resources/schema';
import { CrudService } from './crud.service';
import { CrudServiceFactory } from './crud.service.factory';
import { success, type ResponseEnvelope } from './crud.response';
import type { DeleteRecordResponseDto } from './dto/DeleteRecord.response.dto';
import type { ListRecordsResponseDto } from './dto/ListRecords.response.dto';
import { parsePageQuery } from './internal/page-query.parser';

function mapDomainError(err: unknown): never {
  if (err instanceof InvalidInputError) throw new BadRequestException(err.message);
  if (err instanceof RecordNotFoundError) throw new NotFoundException(err.message);
  throw err;
}

export interface CrudControllerContract<T> {
  list(query: unknown): Promise<ResponseEnvelope<ListRecordsResponseDto<T>>>;
  save(body: unknown): Promise<ResponseEnvelope<T>>;
  remove(id: unknown): Promise<ResponseEnvelope<DeleteRecordResponseDto>>;
}

/**
 * Build the list/save/delete controller of one resource, mounted at `path`
 * (the resource name by default).
 */
export function createCrudController<T extends object>(
  schema: ResourceSchema<T>,
  path: string = schema.name,
): Type<CrudControllerContract<T>> {
  @Controller(path)
  class ResourceCrudController implements CrudControllerContract<T> {
    private readonly svc: CrudService<T>;

    public constructor(@Inject(CrudServiceFactory) factory: CrudServiceFactory) {
      this.svc = factory.create(schema);
    }

    /** Filtered, ordered page: `?page=&size=&<column>__<op>=&order=`. */
    @Get('list')
    public async list(
      @Query() query: unknown,
    ): Promise<ResponseEnvelope<ListRecordsResponseDto<T>>> {
      try {
        const values = toQueryValues(query);
        const { page, size } = parsePageQuery(values);
        const { filters, orders } = extractQueryDirectives(values);
        const res = await this.svc.paginate(
          page,
          size,
          filters,
          resolveOrder(orders, this.svc.allowlist),
        );
        return success({ list: res.items, page, size, total: res.total });
      } catch (err) {
        mapDomainError(err);
      }
    }

    /** Create when the body has no primary key, partial update otherwise. */
    @Post('save')
    @HttpCode(200)
    public async save(@Body() body: unknown): Promise<ResponseEnvelope<T>> {
      try {
        const record = schema.fromPayload(body);
        return success(await this.svc.saveOrUpdate(record));
      } catch (err) {
        mapDomainError(err);
      }
    }

    @Delete('delete')
    public async remove(
      @Query('id') id: unknown,
    ): Promise<ResponseEnvelope<DeleteRecordResponseDto>> {
      const value = typeof id === 'string' ? id : '';
      try {
        await this.svc.deleteById(value);
        return success({ id: value });
      } catch (err) {
        mapDomainError(err);
      }
    }
  }

  return ResourceCrudController;
}
