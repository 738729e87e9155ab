/**
 * Unit tests for Nominatim response schemas
 */

import { describe, it, expect } from 'vitest';
import { PlaceListSchema, PlaceSchema, StatusSchema } from './schemas.js';
import { loadFixture } from '../../tests/helpers.js';

describe('PlaceSchema', () => {
  it('should fill defaults when every field is absent', () => {
    const place = PlaceSchema.parse(loadFixture('place-minimal.json'));

    expect(place).toEqual({
      place_id: 0,
      licence: '',
      osm_type: '',
      osm_id: 0,
      boundingbox: [],
      lat: '',
      lon: '',
      display_name: '',
    });
    expect(place.class).toBeUndefined();
    expect(place.type).toBeUndefined();
    expect(place.importance).toBeUndefined();
    expect(place.icon).toBeUndefined();
    expect(place.address).toBeUndefined();
    expect(place.extratags).toBeUndefined();
  });

  it('should treat null optional fields as absent', () => {
    const place = PlaceSchema.parse({
      place_id: 7,
      importance: null,
      address: null,
      extratags: { wikidata: null, website: 'https://example.org' },
    });

    expect(place.importance).toBeUndefined();
    expect(place.address).toBeUndefined();
    expect(place.extratags).toEqual({ website: 'https://example.org' });
  });

  it('should keep the bounding box order', () => {
    const place = PlaceSchema.parse({ boundingbox: ['53.34', '53.54', '-2.31', '-2.14'] });

    expect(place.boundingbox).toEqual(['53.34', '53.54', '-2.31', '-2.14']);
  });

  it('should map the ISO 3166-2 region code', () => {
    const place = PlaceSchema.parse({ address: { 'ISO3166-2-lvl4': 'GB-ENG', country_code: 'gb' } });

    expect(place.address).toEqual({ 'ISO3166-2-lvl4': 'GB-ENG', country_code: 'gb' });
  });

  it('should drop fields it does not know', () => {
    const place = PlaceSchema.parse({ place_id: 1, namedetails: { name: 'x' } });

    expect(place).not.toHaveProperty('namedetails');
  });

  it('should reject a wrongly typed identifier', () => {
    const result = PlaceSchema.safeParse({ osm_id: '146656' });

    expect(result.success).toBe(false);
  });

  it('should parse the lookup fixture', () => {
    const places = PlaceListSchema.parse(loadFixture('lookup-manchester.json'));

    expect(places).toHaveLength(2);
    expect(places[0].address?.state_district).toBe('Greater Manchester');
    expect(places[0].extratags?.capital).toBe('6');
  });
});

describe('StatusSchema', () => {
  it('should parse a full status', () => {
    expect(StatusSchema.parse(loadFixture('status.json'))).toEqual({
      status: 0,
      message: 'OK',
      data_updated: '2026-10-17T08:12:44+00:00',
      software_version: '4.5.0-0',
      database_version: '4.5.0-0',
    });
  });

  it('should require status and message', () => {
    expect(StatusSchema.safeParse({ message: 'OK' }).success).toBe(false);
    expect(StatusSchema.safeParse({ status: 0 }).success).toBe(false);
  });
});
