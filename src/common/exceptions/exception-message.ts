import { HttpException } from '@nestjs/common';

/**
 * Message carried by an HttpException response body. ValidationPipe puts a
 * list of constraint messages there; other exceptions carry a single string.
 */
export function exceptionMessage(exception: HttpException): string | string[] {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) {
      return message;
    }
  }
  return exception.message;
}

export function firstMessage(exception: HttpException): string {
  const message = exceptionMessage(exception);
  return Array.isArray(message) ? message[0] ?? exception.message : message;
}
