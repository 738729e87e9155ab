/**
 * Zod schemas for Nominatim responses
 *
 * The server populates fields loosely and inconsistently per result type,
 * so identifiers and coordinates fall back to empty values instead of
 * failing, and every other field may be missing or null.
 */

import { z } from 'zod';

/** Missing or null both mean absent */
function absentable<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const optionalString = absentable(z.string());

/** Output of status.php */
export const StatusSchema = z.object({
  status: z.number().describe('0 when the server is healthy'),
  message: z.string().describe('Human readable status, "OK" when healthy'),
  data_updated: optionalString.describe('Timestamp of the last data import'),
  software_version: optionalString,
  database_version: optionalString,
});

export type Status = z.infer<typeof StatusSchema>;

/** Structured address of a place (addressdetails=1) */
export const AddressSchema = z.object({
  house_number: optionalString,
  road: optionalString,
  suburb: optionalString,
  village: optionalString,
  town: optionalString,
  city: optionalString,
  county: optionalString,
  state_district: optionalString,
  state: optionalString,
  'ISO3166-2-lvl4': optionalString.describe('ISO 3166-2 code of the level 4 region'),
  postcode: optionalString,
  country: optionalString,
  country_code: optionalString,
});

export type Address = z.infer<typeof AddressSchema>;

/** Auxiliary OSM tags of a place (extratags=1) */
export const ExtraTagsSchema = z.object({
  capital: optionalString,
  website: optionalString,
  wikidata: optionalString,
  wikipedia: optionalString,
  population: optionalString,
});

export type ExtraTags = z.infer<typeof ExtraTagsSchema>;

/** A single geocoding result */
export const PlaceSchema = z.object({
  place_id: z.number().default(0),
  licence: z.string().default(''),
  osm_type: z.string().default('').describe('node, way or relation'),
  osm_id: z.number().default(0),
  boundingbox: z
    .array(z.string())
    .default([])
    .describe('South, north, west, east as decimal strings'),
  lat: z.string().default(''),
  lon: z.string().default(''),
  display_name: z.string().default(''),
  class: optionalString,
  type: optionalString,
  place_rank: absentable(z.number()),
  addresstype: optionalString,
  name: optionalString,
  importance: absentable(z.number()),
  icon: optionalString,
  address: absentable(AddressSchema),
  extratags: absentable(ExtraTagsSchema),
});

export type Place = z.infer<typeof PlaceSchema>;

export const PlaceListSchema = z.array(PlaceSchema);
