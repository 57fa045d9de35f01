export const LOCATION_TYPES = [
  "zip",
  "coordinates",
  "city",
  "landmark",
] as const;

export type LocationType = (typeof LOCATION_TYPES)[number];

export interface ClassificationResult {
  valid: boolean;
  message: string;
  type: LocationType | null;
}

/**
 * A classified lookup request. Never persisted on its own; the
 * normalized string becomes the record's location name.
 */
export interface LocationQuery {
  readonly raw: string;
  readonly type: LocationType;
  readonly normalized: string;
}

export interface LocationDisplay {
  original: string;
  normalized: string;
  type: LocationType;
  displayName: string;
  latitude?: number;
  longitude?: number;
}

export interface ResolvedLocation {
  latitude: number;
  longitude: number;
  /** Name reported by the geocoder, null for raw coordinates */
  name: string | null;
}
