import {
  ClassSerializerInterceptor,
  INestApplication,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import validationOptions from './validation-options';
import { DomainErrorFilter } from './errors/domain-error.filter';

/**
 * Global prefix, URI versioning, validation, serialization and error
 * mapping. Shared by the bootstrap and the in-process HTTP tests.
 */
export function configureApp(
  app: INestApplication,
  apiPrefix: string,
): INestApplication {
  app.setGlobalPrefix(apiPrefix, { exclude: ['/'] });
  app.enableVersioning({ type: VersioningType.URI });
  app.useGlobalPipes(new ValidationPipe(validationOptions));
  app.useGlobalInterceptors(new ClassSerializerInterceptor(app.get(Reflector)));
  app.useGlobalFilters(new DomainErrorFilter());
  return app;
}
