import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import * as os from 'os';
import { ErrorLog } from './error-log';
import { describeCause, ErrorLogError, InvalidArgumentError, StoreUnavailableError } from './error-log.errors';
import { createErrorRecord, ErrorRecord } from './error-record';

const REDACTED_KEYS = ['password', 'token', 'authorization', 'access_token'];

/**
 * Answers every unhandled exception and records server faults (5xx) in the
 * error log. Failures of the error log itself are only written to the
 * process log.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly errors: ErrorLog) {}

  async catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = statusOf(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR && !(exception instanceof ErrorLogError)) {
      try {
        const id = await this.errors.log(buildRecord(exception, request, status, this.errors.applicationName));
        this.logger.warn(`Logged ${request.method} ${request.path} failure as ${id}`);
      } catch (e) {
        this.logger.error(`Could not log ${request.method} ${request.path} failure: ${describeCause(e)}`);
      }
    } else if (exception instanceof ErrorLogError && !(exception instanceof InvalidArgumentError)) {
      this.logger.error(`${exception.code}: ${exception.message}`);
    }

    response.status(status).json({ statusCode: status, message: publicMessage(exception, status) });
  }
}

function statusOf(exception: unknown): number {
  if (exception instanceof HttpException) return exception.getStatus();
  if (exception instanceof InvalidArgumentError) return HttpStatus.BAD_REQUEST;
  if (exception instanceof StoreUnavailableError) return HttpStatus.SERVICE_UNAVAILABLE;
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

function publicMessage(exception: unknown, status: number): string {
  if (exception instanceof HttpException || exception instanceof InvalidArgumentError) return exception.message;
  if (status === HttpStatus.SERVICE_UNAVAILABLE) return 'Error log unavailable';
  return 'Internal server error';
}

function userOf(request: Request): string {
  const user: unknown = Reflect.get(request, 'user');
  if (typeof user !== 'object' || user === null) return '';
  const id: unknown = Reflect.get(user, 'id');
  return typeof id === 'string' || typeof id === 'number' ? String(id) : '';
}

function sanitize(body: unknown): unknown {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return body;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(body)) {
    out[k] = REDACTED_KEYS.includes(k.toLowerCase()) ? '[REDACTED]' : v;
  }
  return out;
}

export function buildRecord(exception: unknown, request: Request, status: number, applicationName = ''): ErrorRecord {
  const err = exception instanceof Error ? exception : undefined;
  return createErrorRecord({
    applicationName,
    hostName: os.hostname(),
    type: err?.name ?? typeof exception,
    source: `${request.method} ${request.path}`,
    message: err?.message || String(exception) || 'Unhandled error',
    user: userOf(request),
    statusCode: status,
    time: new Date(),
    detail: JSON.stringify(
      {
        stack: err?.stack ?? null,
        url: request.originalUrl,
        query: request.query,
        body: sanitize(request.body),
        userAgent: request.headers['user-agent'] ?? null,
      },
      null,
      2,
    ),
  });
}
