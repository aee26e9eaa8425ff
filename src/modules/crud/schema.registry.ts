import { Injectable } from '@nestjs/common';
import { SchemaDefinitionError } from '../../lib/errors/CrudError';
import { introspect, type ResourceShape } from '../../lib/resources/introspect';
import type { ResourceSchema } from '../../lib/resources/schema';

/**
 * Per-application cache of resource shapes. A shape is derived on first use
 * and never changes afterwards; deriving it twice yields the same value.
 */
@Injectable()
export class SchemaRegistry {
  private readonly entries = new Map<
    string,
    { readonly schema: ResourceSchema<object>; readonly shape: ResourceShape }
  >();

  public resolve(schema: ResourceSchema<object>): ResourceShape {
    const cached = this.entries.get(schema.name);
    if (cached) {
      if (cached.schema !== schema) {
        throw new SchemaDefinitionError(schema.name, 'resource name already registered');
      }
      return cached.shape;
    }
    const shape = introspect(schema);
    this.entries.set(schema.name, { schema, shape });
    return shape;
  }
}
