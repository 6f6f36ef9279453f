/**
 * Location Normalization
 *
 * Survey locations are free text of the form "City, State". Only the first comma splits;
 * anything after it (including further commas) is the state part.
 */

export const DEFAULT_COUNTRY = 'United States';

export interface ParsedLocation {
  city: string;
  state: string | null;
}

export function parseLocation(location: string): ParsedLocation {
  const commaIndex = location.indexOf(',');

  // "Remote", "Boston" etc. keep the whole string as the city
  if (commaIndex === -1) {
    return { city: location.trim(), state: null };
  }

  return {
    city: location.slice(0, commaIndex).trim(),
    state: location.slice(commaIndex + 1).trim(),
  };
}
