import { ExceptionFilter, Catch, ArgumentsHost, HttpStatus } from '@nestjs/common';
import { Request, Response } from 'express';
import { RecordStoreErrorKind } from 'src/modules/records/errors/record-store.errors';
import { RecordStoreException } from 'src/modules/records/errors/record-store.exception';

const STATUS_BY_KIND: Record<RecordStoreErrorKind, { status: HttpStatus; error: string }> = {
  [RecordStoreErrorKind.NOT_FOUND]: { status: HttpStatus.NOT_FOUND, error: 'Not Found' },
  [RecordStoreErrorKind.INVALID_ARGUMENT]: { status: HttpStatus.BAD_REQUEST, error: 'Bad Request' },
  [RecordStoreErrorKind.STORAGE_UNAVAILABLE]: {
    status: HttpStatus.SERVICE_UNAVAILABLE,
    error: 'Service Unavailable',
  },
};

@Catch(RecordStoreException)
export class RecordStoreExceptionFilter implements ExceptionFilter {
  catch(exception: RecordStoreException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, error } = STATUS_BY_KIND[exception.error.kind];

    response.status(status).json({
      statusCode: status,
      message: exception.message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
    });
  }
}
