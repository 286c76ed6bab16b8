import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { Equals, IsISO8601, IsInt, IsString, validateSync } from 'class-validator';
import { CodecError, describeCause } from './error-log.errors';
import { createErrorRecord, ErrorRecord } from './error-record';

export const ERROR_DOCUMENT_KIND = 'error';
export const ERROR_DOCUMENT_VERSION = 1;

/** Shape of the stored detail document. */
export class ErrorDocument {
  @Equals(ERROR_DOCUMENT_KIND)
  kind!: string;

  @Equals(ERROR_DOCUMENT_VERSION)
  version!: number;

  @IsString() applicationName!: string;
  @IsString() hostName!: string;
  @IsString() type!: string;
  @IsString() source!: string;
  @IsString() message!: string;
  @IsString() user!: string;

  @IsInt()
  statusCode!: number;

  @IsISO8601({ strict: true })
  time!: string;

  @IsString()
  detail!: string;
}

export function encodeErrorRecord(record: ErrorRecord): string {
  if (!(record.time instanceof Date) || Number.isNaN(record.time.getTime())) {
    throw new CodecError('Error time is not a valid date');
  }
  // key order is part of the format and follows the field order of ErrorDocument
  const doc = plainToInstance(ErrorDocument, {
    kind: ERROR_DOCUMENT_KIND,
    version: ERROR_DOCUMENT_VERSION,
    applicationName: record.applicationName,
    hostName: record.hostName,
    type: record.type,
    source: record.source,
    message: record.message,
    user: record.user,
    statusCode: record.statusCode,
    time: record.time.toISOString(),
    detail: record.detail,
  });
  assertValid(doc, 'Error record cannot be encoded');
  return JSON.stringify(doc);
}

export function decodeErrorRecord(text: string): ErrorRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new CodecError(`Error document is not valid JSON: ${describeCause(e)}`, { cause: e });
  }
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new CodecError('Error document must be a JSON object');
  }

  const doc = plainToInstance(ErrorDocument, raw);
  assertValid(doc, 'Error document failed validation');

  return createErrorRecord({
    applicationName: doc.applicationName,
    hostName: doc.hostName,
    type: doc.type,
    source: doc.source,
    message: doc.message,
    user: doc.user,
    statusCode: doc.statusCode,
    time: new Date(doc.time),
    detail: doc.detail,
  });
}

function assertValid(doc: ErrorDocument, context: string) {
  const problems = validateSync(doc);
  if (problems.length > 0) {
    const fields = problems.map((p) => p.property).join(', ');
    throw new CodecError(`${context}: ${fields}`);
  }
}
