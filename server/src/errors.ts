/**
 * Error taxonomy for a search run.
 *
 * Only GeocodeFailure and ProviderUnavailable end a run. Everything else is
 * local to one tile, page or place and is turned into a RunWarning.
 */

export class GeocodeFailure extends Error {
  readonly providerStatus?: string;

  constructor(message: string, providerStatus?: string) {
    super(message);
    this.name = 'GeocodeFailure';
    this.providerStatus = providerStatus;
  }
}

export class ProviderQuotaExceeded extends Error {
  constructor(message = 'Provider quota exceeded') {
    super(message);
    this.name = 'ProviderQuotaExceeded';
  }
}

export class ProviderTransientError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ProviderTransientError';
    this.status = status;
  }
}

/** Non-transient provider answer such as REQUEST_DENIED or INVALID_REQUEST. */
export class ProviderRequestError extends Error {
  readonly providerStatus: string;

  constructor(message: string, providerStatus: string) {
    super(message);
    this.name = 'ProviderRequestError';
    this.providerStatus = providerStatus;
  }
}

export class PlaceDetailsUnavailable extends Error {
  readonly placeId: string;

  constructor(placeId: string, reason: string) {
    super(`Place details unavailable for ${placeId}: ${reason}`);
    this.name = 'PlaceDetailsUnavailable';
    this.placeId = placeId;
  }
}

export class ProviderUnavailable extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderUnavailable';
  }
}

export class RunCancelled extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'RunCancelled';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
