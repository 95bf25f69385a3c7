import type { CreateMarkerInput, MarkerCategory, RequiredMarkerField } from '../types/marker';
import { MARKER_CATEGORIES, REQUIRED_MARKER_FIELDS } from '../types/marker';

/**
 * Rectangular approximation of India's extent. Points near the borders of
 * neighbouring countries pass; polygon containment is not attempted.
 */
export const INDIA_BOUNDS = {
  minLat: 6.5,
  maxLat: 35.7,
  minLng: 68.1,
  maxLng: 97.4,
} as const;

const TEXT_FIELDS = ['state', 'city', 'locality', 'contact'] as const;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type TextField = (typeof TEXT_FIELDS)[number];

export type MarkerValidationCode =
  | 'INVALID_BODY'
  | 'MISSING_FIELDS'
  | 'INVALID_COORDINATES'
  | 'OUTSIDE_BOUNDS'
  | 'INVALID_CATEGORY'
  | 'INVALID_TEXT';

export interface MarkerValidationError {
  code: MarkerValidationCode;
  message: string;
}

export type MarkerValidationResult =
  | { ok: true; value: CreateMarkerInput }
  | { ok: false; error: MarkerValidationError };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissing(field: RequiredMarkerField, value: unknown): boolean {
  // A coordinate key that is present but unusable is reported as an invalid coordinate.
  if (field === 'lat' || field === 'lng') {
    return value === undefined;
  }
  if (value === undefined || value === null) {
    return true;
  }
  return typeof value === 'string' && value.trim().length === 0;
}

function isMarkerCategory(value: unknown): value is MarkerCategory {
  return typeof value === 'string' && MARKER_CATEGORIES.some((category) => category === value);
}

export function isPointInIndia(lat: number, lng: number): boolean {
  return (
    INDIA_BOUNDS.minLat <= lat &&
    lat <= INDIA_BOUNDS.maxLat &&
    INDIA_BOUNDS.minLng <= lng &&
    lng <= INDIA_BOUNDS.maxLng
  );
}

/** Accepts JSON numbers and decimal strings, as form posts send both. Hex, binary and octal literals are rejected. */
export function parseCoordinate(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function readText(payload: Record<string, unknown>, field: TextField): string {
  const value = payload[field];
  return typeof value === 'string' ? value.trim() : '';
}

function fail(code: MarkerValidationCode, message: string): MarkerValidationResult {
  return { ok: false, error: { code, message } };
}

/** Rules run in a fixed order and the first failure wins. */
export function validateCreateMarkerPayload(payload: unknown): MarkerValidationResult {
  if (!isPlainObject(payload)) {
    return fail('INVALID_BODY', 'Request body must be a JSON object');
  }

  const missing: RequiredMarkerField[] = REQUIRED_MARKER_FIELDS.filter((field) => isMissing(field, payload[field]));
  if (missing.length > 0) {
    return fail('MISSING_FIELDS', `Missing required fields: ${missing.join(', ')}`);
  }

  const lat = parseCoordinate(payload.lat);
  const lng = parseCoordinate(payload.lng);
  if (lat === null || lng === null) {
    return fail('INVALID_COORDINATES', 'Invalid coordinates: lat and lng must be numbers');
  }

  if (!isPointInIndia(lat, lng)) {
    return fail('OUTSIDE_BOUNDS', 'Location must be within India boundaries');
  }

  const category = payload.category;
  if (!isMarkerCategory(category)) {
    return fail('INVALID_CATEGORY', `Invalid category. Must be one of: ${MARKER_CATEGORIES.join(', ')}`);
  }

  const nonText = TEXT_FIELDS.filter((field) => typeof payload[field] !== 'string');
  if (nonText.length > 0) {
    return fail('INVALID_TEXT', `Invalid fields: ${nonText.join(', ')} must be text`);
  }

  return {
    ok: true,
    value: {
      lat,
      lng,
      state: readText(payload, 'state'),
      city: readText(payload, 'city'),
      locality: readText(payload, 'locality'),
      category,
      contact: readText(payload, 'contact'),
    },
  };
}
