import { z } from 'zod';

import { ParseError } from '../errors';

export type ObjectType = 'payload' | 'rocket-body' | 'debris' | 'unknown';

export interface GeoPosition {
  latitude: number;
  longitude: number;
  /** km */
  altitude: number;
}

export interface OrbitalObject {
  readonly noradId: string;
  readonly name: string;
  readonly objectType: ObjectType;
  readonly launchDate?: Date;
  readonly country?: string;
  readonly position?: Readonly<GeoPosition>;
}

export type RawRecord = Record<string, unknown>;

export type ParseResult = { ok: true; object: OrbitalObject } | { ok: false; error: ParseError };

export interface ParsedBatch {
  objects: OrbitalObject[];
  failures: ParseError[];
}

const NUMERIC_TEXT = /^[-+]?\d+(\.\d+)?([eE][-+]?\d+)?$/;

const finiteNumber = z.union([
  z.number().finite(),
  z.string().trim().regex(NUMERIC_TEXT).transform(Number)
]);

const noradIdSchema = z.union([
  z.number().int().positive().transform(String),
  z.string().trim().min(1)
]);

const text = z.string().trim().min(1);

// Chaque champ est optionnel et retombe sur undefined s'il est mal formé :
// seul l'identifiant NORAD est obligatoire.
const rawSatelliteSchema = z.object({
  number: noradIdSchema.optional().catch(undefined),
  norad_id: noradIdSchema.optional().catch(undefined),
  noradId: noradIdSchema.optional().catch(undefined),
  name: text.optional().catch(undefined),
  type: z.union([text, z.number()]).optional().catch(undefined),
  classification: z.union([text, z.number()]).optional().catch(undefined),
  object_type: z.union([text, z.number()]).optional().catch(undefined),
  launch_date: text.optional().catch(undefined),
  launchDate: text.optional().catch(undefined),
  country: text.optional().catch(undefined),
  country_code: text.optional().catch(undefined),
  countryCode: text.optional().catch(undefined),
  latitude: finiteNumber.optional().catch(undefined),
  longitude: finiteNumber.optional().catch(undefined),
  altitude: finiteNumber.optional().catch(undefined),
  height: finiteNumber.optional().catch(undefined),
  coordinates: z.array(finiteNumber).min(2).optional().catch(undefined)
});

type RawSatellite = z.infer<typeof rawSatelliteSchema>;

const TYPE_ALIASES: Record<string, ObjectType> = {
  payload: 'payload',
  satellite: 'payload',
  pay: 'payload',
  'rocket body': 'rocket-body',
  'rocket-body': 'rocket-body',
  rocket_body: 'rocket-body',
  'r/b': 'rocket-body',
  rb: 'rocket-body',
  debris: 'debris',
  deb: 'debris'
};

// Codes numériques façon KeepTrack.
const TYPE_CODES: Record<number, ObjectType> = {
  1: 'payload',
  2: 'rocket-body',
  3: 'debris'
};

export function toObjectType(value: string | number | undefined): ObjectType {
  if (value === undefined) {
    return 'unknown';
  }
  if (typeof value === 'number') {
    return TYPE_CODES[value] ?? 'unknown';
  }
  return TYPE_ALIASES[value.trim().toLowerCase()] ?? 'unknown';
}

function toLaunchDate(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

function toPosition(raw: RawSatellite): GeoPosition | undefined {
  let latitude = raw.latitude;
  let longitude = raw.longitude;
  // Format de l'endpoint location : coordinates = [lng, lat]
  if (raw.coordinates) {
    longitude ??= raw.coordinates[0];
    latitude ??= raw.coordinates[1];
  }
  const altitude = raw.altitude ?? raw.height;

  if (latitude === undefined || longitude === undefined || altitude === undefined) {
    return undefined;
  }
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    return undefined;
  }
  return Object.freeze({ latitude, longitude, altitude });
}

export function parseOrbitalObject(record: unknown, index?: number): ParseResult {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    return { ok: false, error: new ParseError('record is not an object', record, index) };
  }

  const parsed = rawSatelliteSchema.safeParse(record);
  if (!parsed.success) {
    return { ok: false, error: new ParseError(parsed.error.issues[0]?.message ?? 'invalid record', record, index) };
  }

  const raw = parsed.data;
  const noradId = raw.number ?? raw.norad_id ?? raw.noradId;
  if (!noradId) {
    return { ok: false, error: new ParseError('missing NORAD id', record, index) };
  }

  const launchDate = toLaunchDate(raw.launch_date ?? raw.launchDate);
  const country = raw.country ?? raw.country_code ?? raw.countryCode;
  const position = toPosition(raw);

  const object: OrbitalObject = {
    noradId,
    name: raw.name ?? 'Unknown',
    objectType: toObjectType(raw.type ?? raw.classification ?? raw.object_type),
    ...(launchDate ? { launchDate } : {}),
    ...(country ? { country } : {}),
    ...(position ? { position } : {})
  };

  return { ok: true, object: Object.freeze(object) };
}

/** Parses every record it can; the rest are reported in `failures`. */
export function parseOrbitalObjects(records: readonly unknown[]): ParsedBatch {
  const objects: OrbitalObject[] = [];
  const failures: ParseError[] = [];

  records.forEach((record, index) => {
    const result = parseOrbitalObject(record, index);
    if (result.ok) {
      objects.push(result.object);
    } else {
      failures.push(result.error);
    }
  });

  return { objects, failures };
}

export function hasPosition(object: OrbitalObject): object is OrbitalObject & { position: Readonly<GeoPosition> } {
  return object.position !== undefined;
}

export function describeOrbitalObject(object: OrbitalObject): string {
  return `${object.name} [${object.noradId}] (${object.objectType})`;
}
