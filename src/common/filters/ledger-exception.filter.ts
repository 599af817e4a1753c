import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { Request, Response } from 'express';
import { LedgerError } from '../../analysis/errors/ledger.errors';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';
import { toDateKey } from '../utils/date.util';

// Structurally broken ledgers are 422s carrying the offending record's position.
@Catch(LedgerError)
export class LedgerExceptionFilter implements ExceptionFilter {
  catch(exception: LedgerError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();
    const { account, symbol, date, index } = exception.context;

    const body: HttpExceptionResponse = {
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      message: exception.message,
      error: exception.code,
      timestamp: new Date().toISOString(),
      path: request.url,
      context: { account, symbol, date: date ? toDateKey(date) : undefined, index },
    };
    response.status(HttpStatus.UNPROCESSABLE_ENTITY).json(body);
  }
}
