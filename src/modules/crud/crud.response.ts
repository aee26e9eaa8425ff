import { HttpStatus } from '@nestjs/common';

export const SUCCESS_CODE = 0;

/** Body of every CRUD response. */
export interface ResponseEnvelope<T> {
  code: number;
  message: string;
  data: T;
}

export function success<T>(data: T): ResponseEnvelope<T> {
  return { code: SUCCESS_CODE, message: 'OK', data };
}

export function failure(
  status: number,
  message: string,
): ResponseEnvelope<Record<string, never>> {
  const code = status < HttpStatus.BAD_REQUEST ? HttpStatus.INTERNAL_SERVER_ERROR : status;
  return { code, message, data: {} };
}
