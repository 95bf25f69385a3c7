export const MARKER_CATEGORIES = ['large', 'small', 'devices'] as const;

export type MarkerCategory = (typeof MARKER_CATEGORIES)[number];

export const REQUIRED_MARKER_FIELDS = [
  'lat',
  'lng',
  'state',
  'city',
  'locality',
  'category',
  'contact',
] as const;

export type RequiredMarkerField = (typeof REQUIRED_MARKER_FIELDS)[number];

export interface CreateMarkerInput {
  lat: number;
  lng: number;
  state: string;
  city: string;
  locality: string;
  category: MarkerCategory;
  contact: string;
}

export interface CreateMarkerPersistenceInput extends CreateMarkerInput {
  createdAt: Date;
}

export interface MarkerRecord {
  id: number;
  lat: number;
  lng: number;
  state: string;
  city: string;
  locality: string;
  category: MarkerCategory;
  contact: string;
  isActive: boolean;
  createdAt: Date | null;
}

/** Wire shape consumed by the map client. */
export interface MarkerJson {
  id: number;
  lat: number;
  lng: number;
  state: string;
  city: string;
  locality: string;
  category: MarkerCategory;
  contact: string;
  is_active: boolean;
  created_at: string | null;
}

export interface ErrorResponse {
  error: string;
}

export interface MessageResponse {
  message: string;
}

export function serializeMarker(record: MarkerRecord): MarkerJson {
  return {
    id: record.id,
    lat: record.lat,
    lng: record.lng,
    state: record.state,
    city: record.city,
    locality: record.locality,
    category: record.category,
    contact: record.contact,
    is_active: record.isActive,
    created_at: record.createdAt ? record.createdAt.toISOString() : null,
  };
}
