import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { QueryFailedError } from 'typeorm';

// PostgreSQL SQLSTATE codes
const FOREIGN_KEY_VIOLATION = '23503';
const UNIQUE_VIOLATION = '23505';
const NOT_NULL_VIOLATION = '23502';
const NUMERIC_VALUE_OUT_OF_RANGE = '22003';

export interface ErrorBody {
  statusCode: number;
  message: string;
  error: string;
}

function sqlState(error: QueryFailedError): string | undefined {
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    return typeof driverError.code === 'string' ? driverError.code : undefined;
  }
  return undefined;
}

export function toErrorBody(error: QueryFailedError): ErrorBody {
  switch (sqlState(error)) {
    case FOREIGN_KEY_VIOLATION:
      return { statusCode: HttpStatus.CONFLICT, message: 'Referenced record does not exist or is still referenced', error: 'Conflict' };
    case UNIQUE_VIOLATION:
      return { statusCode: HttpStatus.CONFLICT, message: 'Record already exists', error: 'Conflict' };
    case NOT_NULL_VIOLATION:
      return { statusCode: HttpStatus.BAD_REQUEST, message: 'Missing required value', error: 'Bad Request' };
    case NUMERIC_VALUE_OUT_OF_RANGE:
      return { statusCode: HttpStatus.BAD_REQUEST, message: 'Numeric value out of range', error: 'Bad Request' };
    default:
      return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error', error: 'Internal Server Error' };
  }
}

/** Maps constraint violations raised by PostgreSQL to HTTP errors. */
@Catch(QueryFailedError)
export class QueryFailedFilter implements ExceptionFilter {
  private readonly logger = new Logger(QueryFailedFilter.name);

  catch(exception: QueryFailedError, host: ArgumentsHost) {
    const body = toErrorBody(exception);
    if (body.statusCode >= 500) {
      this.logger.error(exception.message, exception.stack);
    } else {
      this.logger.warn(`${exception.message} (${sqlState(exception)})`);
    }

    const response = host.switchToHttp().getResponse<Response>();
    response.status(body.statusCode).json(body);
  }
}
