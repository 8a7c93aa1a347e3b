import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';
import { ErrorKind } from './errors/domain-error';

type FieldErrors = { [field: string]: string | FieldErrors };

function collectFieldErrors(errors: ValidationError[]): FieldErrors {
  const result: FieldErrors = {};
  for (const error of errors) {
    result[error.property] =
      error.children && error.children.length > 0
        ? collectFieldErrors(error.children)
        : Object.values(error.constraints ?? {}).join(', ');
  }
  return result;
}

// Request-shape failures answer 400 with the same body layout as DomainError.
const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      error: ErrorKind.InvalidInput,
      message: 'Request validation failed',
      details: collectFieldErrors(errors),
    }),
};

export default validationOptions;
