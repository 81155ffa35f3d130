// src/itinerary-planning/__tests__/spot-catalog.spec.ts

import { SpotCatalog } from '../catalog/spot-catalog';
import { City } from '../world-model';
import { catalogOf, itineraryOf, makeSpot } from './planning.test-data';

describe('SpotCatalog', () => {
  const a = makeSpot('a', 35.6, 139.7);
  const b = makeSpot('b', 35.7, 139.8);
  const c = makeSpot('c', 35.65, 139.75);

  describe('forCity', () => {
    it('should derive the bounding region from spot coordinates', () => {
      const catalog = catalogOf([a, b, c]);
      const city = catalog.getCity('testville');

      expect(city?.bounds).toEqual({ north: 35.7, south: 35.6, east: 139.8, west: 139.7 });
      expect(city?.spotIds).toEqual(['a', 'b', 'c']);
    });
  });

  describe('queries', () => {
    const osaka: City = {
      id: 'osaka',
      name: 'Osaka',
      bounds: { north: 35, south: 34, east: 136, west: 135 },
      spotIds: ['c', 'ghost'],
    };
    const catalog = new SpotCatalog(
      [
        { id: 'tokyo', name: 'Tokyo', bounds: { north: 36, south: 35, east: 140, west: 139 }, spotIds: ['a', 'b'] },
        osaka,
      ],
      [a, b, c],
    );

    it('should list spots by city and skip ids missing from the catalog', () => {
      expect(catalog.listSpotsByCity('tokyo').map(s => s.id)).toEqual(['a', 'b']);
      expect(catalog.listSpotsByCity('osaka').map(s => s.id)).toEqual(['c']);
      expect(catalog.listSpotsByCity('nowhere')).toEqual([]);
    });

    it('should look up spots and cities by id', () => {
      expect(catalog.getSpot('b')).toBe(b);
      expect(catalog.getSpot('ghost')).toBeUndefined();
      expect(catalog.hasSpot('c')).toBe(true);
      expect(catalog.getCity('osaka')).toBe(osaka);
      expect(catalog.listCities().map(city => city.id)).toEqual(['tokyo', 'osaka']);
    });

    it('should resolve a day to known spots in visit order', () => {
      expect(catalog.resolveDay({ day: 1, spotIds: ['b', 'ghost', 'a'] })).toEqual([b, a]);
    });
  });

  describe('validate', () => {
    const catalog = catalogOf([a, b, c]);

    it('should accept an itinerary with each spot at most once', () => {
      const result = catalog.validate(itineraryOf('testville', ['a', 'b'], [], ['c']));

      expect(result.feasible).toBe(true);
      expect(result.violations).toHaveLength(0);
    });

    it('should report a spot assigned to two days', () => {
      const result = catalog.validate(itineraryOf('testville', ['a', 'b'], ['c', 'a']));

      expect(result.feasible).toBe(false);
      expect(result.violations).toEqual([
        {
          code: 'DUPLICATE_SPOT',
          day: 2,
          spotId: 'a',
          firstDay: 1,
          message: 'Day 2: spot "a" is already assigned to day 1',
        },
      ]);
    });

    it('should report spots outside the catalog', () => {
      const result = catalog.validate(itineraryOf('testville', ['a'], ['zzz']));

      expect(result.feasible).toBe(false);
      expect(result.violations).toEqual([
        {
          code: 'UNKNOWN_SPOT',
          day: 2,
          spotId: 'zzz',
          message: 'Day 2: spot "zzz" is not in the catalog',
        },
      ]);
    });
  });
});
