import type { Response } from 'express';
import type { JournalErrorKind } from '../../utils/errors.js';

const STATUS_BY_KIND: Record<JournalErrorKind, number> = {
  OutOfRange: 400,
  InvalidArgument: 400,
  NotFound: 404,
  JournalExhausted: 409,
  PartialFailure: 502,
};

type Outcome = { status: 'success' } | { status: 'error'; errorKind: JournalErrorKind };

export function httpStatusFor(result: Outcome): number {
  return result.status === 'success' ? 200 : STATUS_BY_KIND[result.errorKind];
}

export function sendResult(
  res: Response,
  result: Outcome
): void {
  res.status(httpStatusFor(result)).json(result);
}

/** Reads one property off an untrusted JSON body. */
export function field(body: unknown, name: string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  return Reflect.get(body, name);
}
