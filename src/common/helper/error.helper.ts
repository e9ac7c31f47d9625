import { HttpException, InternalServerErrorException } from '@nestjs/common';

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// HTTP exceptions pass through; anything else surfaces as a 500 with its message
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) return error;
  return new InternalServerErrorException({ error: errorMessage(error) });
}
