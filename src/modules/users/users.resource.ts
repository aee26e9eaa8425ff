import { defineResource, field, type ResourceRecord } from '../../lib/resources/schema';

export const usersResource = defineResource(
  'users',
  {
    id: field.objectId({ primary: true }),
    name: field.string(),
    email: field.string({ column: 'email_address' }),
    age: field.number(),
    status: field.number(),
    createdAt: field.date({ column: 'created_at', auto: 'createTime' }),
    updatedAt: field.date({ column: 'updated_at', auto: 'updateTime' }),
  },
  { collection: 'users' },
);

export type User = ResourceRecord<typeof usersResource>;
