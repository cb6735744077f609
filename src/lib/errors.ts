import type { Jurisdiction } from './types';

export type ParseErrorKind = 'MalformedIdentifierError' | 'InvalidRangeError';

/**
 * A parcel entry that could not be turned into an identifier. These are
 * returned per entry, never thrown across a batch.
 */
export abstract class ParseError extends Error {
  abstract readonly kind: ParseErrorKind;

  constructor(
    readonly raw: string,
    readonly reason: string
  ) {
    super(`${reason}: '${raw}'`);
  }
}

export class MalformedIdentifierError extends ParseError {
  readonly kind = 'MalformedIdentifierError';
  override readonly name = 'MalformedIdentifierError';
}

export class InvalidRangeError extends ParseError {
  readonly kind = 'InvalidRangeError';
  override readonly name = 'InvalidRangeError';
}

export type QueryFailure = 'http' | 'service' | 'timeout' | 'network' | 'invalid-response' | 'not-found';

export class QueryError extends Error {
  override readonly name = 'QueryError';

  constructor(
    message: string,
    readonly reason: QueryFailure,
    readonly details: { jurisdiction?: Jurisdiction; status?: number; url?: string } = {}
  ) {
    super(message);
  }

  get jurisdiction(): Jurisdiction | undefined {
    return this.details.jurisdiction;
  }

  get status(): number | undefined {
    return this.details.status;
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
