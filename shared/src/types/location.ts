export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** Human-readable place parsed from a reverse-geocoded address. */
export interface PlaceName {
  city: string;
  region: string;
}

export const UNKNOWN_PLACE: PlaceName = { city: 'Unknown', region: 'Unknown' };
