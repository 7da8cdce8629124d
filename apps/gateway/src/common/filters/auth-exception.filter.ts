// src/common/filters/auth-exception.filter.ts
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { AuthError, TokenValidationError } from '../../modules/auth/auth.errors';
import { UNAUTHORIZED_MESSAGE } from '../../modules/auth/auth.constants';

interface ErrorBody {
  statusCode: number;
  message: string;
}

export function toErrorBody(err: AuthError | TokenValidationError): ErrorBody {
  if (err instanceof TokenValidationError) {
    return { statusCode: HttpStatus.UNAUTHORIZED, message: UNAUTHORIZED_MESSAGE };
  }
  switch (err.kind) {
    case 'InvalidCredentials':
      return { statusCode: HttpStatus.UNAUTHORIZED, message: err.message };
    case 'DuplicateIdentity':
      return { statusCode: HttpStatus.CONFLICT, message: err.message };
    case 'HashingFailure':
    case 'SigningFailure':
    case 'MissingSecret':
    case 'CredentialStoreFailure':
      return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error' };
  }
}

/**
 * Maps auth domain errors to HTTP responses.
 * Internal kinds are logged in full and answered with a generic 500.
 */
@Catch(AuthError, TokenValidationError)
export class AuthExceptionFilter implements ExceptionFilter<AuthError | TokenValidationError> {
  private readonly logger = new Logger(AuthExceptionFilter.name);

  catch(err: AuthError | TokenValidationError, host: ArgumentsHost) {
    const body = toErrorBody(err);
    if (body.statusCode >= 500) {
      this.logger.error(`${err.kind}: ${err.message}`, err.stack);
    }
    host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
  }
}
