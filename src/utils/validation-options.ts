import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

/**
 * Field path -> joined constraint messages, nested for nested DTOs
 */
export interface ValidationErrorMap {
  [property: string]: string | ValidationErrorMap;
}

function generateErrors(errors: ValidationError[]): ValidationErrorMap {
  const result: ValidationErrorMap = {};
  for (const error of errors) {
    const children = error.children ?? [];
    result[error.property] =
      children.length > 0
        ? generateErrors(children)
        : Object.values(error.constraints ?? {}).join(', ');
  }
  return result;
}

// Unknown body fields are a 400, not stripped
const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  forbidNonWhitelisted: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: generateErrors(errors),
    }),
};

export default validationOptions;
