import { ArgumentsHost, BadRequestException, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { flash } from '../flash/flash';
import { firstMessage } from './exception-message';

/**
 * Sends a rejected form submission back to the form it came from with the
 * first validation message as a flash notice.
 */
@Catch(BadRequestException)
export class FormValidationFilter implements ExceptionFilter {
  private readonly logger = new Logger(FormValidationFilter.name);

  catch(exception: BadRequestException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const message = firstMessage(exception);
    this.logger.debug(`${request.method} ${request.originalUrl} rejected: ${message}`);

    flash(response, 'error', message);
    response.redirect(request.originalUrl);
  }
}
