import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import {
  GeocodeFailure,
  ProviderQuotaExceeded,
  ProviderRequestError,
  ProviderTransientError,
  ProviderUnavailable,
  RunCancelled,
} from '../errors';

export interface HttpFailure {
  status: number;
  error: string;
}

export const asyncHandler = (fn: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    void Promise.resolve(fn(req, res)).catch((err: unknown) => {
      next(err);
    });
  };

/** Status and public message for errors that end a run; null for anything unexpected. */
export function toHttpFailure(err: unknown): HttpFailure | null {
  if (err instanceof GeocodeFailure) {
    return { status: 422, error: `Address could not be resolved: ${err.message}` };
  }
  if (err instanceof ProviderQuotaExceeded) {
    return { status: 503, error: 'Provider quota exceeded, please try again later.' };
  }
  if (
    err instanceof ProviderUnavailable ||
    err instanceof ProviderTransientError ||
    err instanceof ProviderRequestError
  ) {
    return { status: 502, error: 'Upstream data source unavailable' };
  }
  if (err instanceof RunCancelled) {
    return { status: 499, error: 'Request cancelled' };
  }
  return null;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const failure = toHttpFailure(err);
  if (failure) {
    res.status(failure.status).json({ error: failure.error });
    return;
  }

  console.error('Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
};
