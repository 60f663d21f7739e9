import type { PlacesProvider } from '../adapters/PlacesProvider';
import type { ResolvedAddress } from '../types/search';
import { GeocodeFailure } from '../errors';

/** Free-text address to a canonical center. Not-found is never retried. */
export class AddressResolver {
  constructor(private readonly provider: PlacesProvider) {}

  async resolve(text: string, signal?: AbortSignal): Promise<ResolvedAddress> {
    const normalized = text.replace(/\s+/g, ' ').trim();
    if (!normalized) {
      throw new GeocodeFailure('Address is empty');
    }

    const resolved = await this.provider.geocode(normalized, signal);
    console.info(
      `AddressResolver: "${normalized}" -> ${resolved.formattedAddress} ` +
        `(${resolved.center.lat.toFixed(5)}, ${resolved.center.lng.toFixed(5)})`,
    );
    return resolved;
  }
}
