import { ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import cookieParser from 'cookie-parser';
import { join } from 'path';
import { ConfigService } from './config/config.service';
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';

// Beside src/ when run from sources, beside dist/ once built.
export const VIEWS_DIR = join(__dirname, '..', 'views');

/** Middleware, view engine and global pipes shared by the server and the HTTP tests. */
export function configureApp(app: NestExpressApplication, configService: ConfigService): void {
  app.use(cookieParser(configService.getOrDefault('SECRET_KEY', 'devkey')));

  app.setBaseViewsDir(VIEWS_DIR);
  app.setViewEngine('hbs');

  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());
}
