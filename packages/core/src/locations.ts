import { RecordValidationError } from './errors.js';
import { LocationName } from './schema.js';
import type { LocationScope } from './types.js';

/**
 * Preset scopes for named scoring locations
 */
export const LOCATION_PRESETS: Readonly<Record<string, Readonly<LocationScope>>> = Object.freeze({
  [LocationName.EGYPT]: Object.freeze({ country: LocationName.EGYPT }),
  [LocationName.JORDAN]: Object.freeze({ country: LocationName.JORDAN }),
  [LocationName.SAUDI_ARABIA]: Object.freeze({ country: LocationName.SAUDI_ARABIA }),
  [LocationName.TAHRIR]: Object.freeze({ country: LocationName.EGYPT, city: LocationName.TAHRIR }),
  [LocationName.AMMAN]: Object.freeze({ country: LocationName.JORDAN, state: LocationName.AMMAN }),
  [LocationName.IRBID]: Object.freeze({ country: LocationName.JORDAN, state: LocationName.IRBID }),
  [LocationName.MADABA]: Object.freeze({ country: LocationName.JORDAN, state: LocationName.MADABA }),
});

/**
 * Resolve a preset name, or pass an explicit scope through
 */
export function resolveLocationScope(location: string | LocationScope): LocationScope {
  if (typeof location !== 'string') {
    return { ...location };
  }
  const preset = Object.prototype.hasOwnProperty.call(LOCATION_PRESETS, location)
    ? LOCATION_PRESETS[location]
    : undefined;
  if (!preset) {
    throw new RecordValidationError(
      `Unknown location: ${location}. Supported: ${Object.keys(LOCATION_PRESETS).join(', ')}`
    );
  }
  return { ...preset };
}

/**
 * Human-readable label for a scope, e.g. "Jordan/Amman"
 */
export function formatLocationScope(scope: LocationScope): string {
  return [scope.country, scope.state, scope.city].filter((part) => part !== undefined).join('/');
}
