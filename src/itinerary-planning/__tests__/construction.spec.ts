// src/itinerary-planning/__tests__/construction.spec.ts

import {
  constructItinerary,
  geographicSweep,
  nearestNeighborPath,
  splitEvenly,
} from '../planner/construction';
import { makeSpot, meridianSpots, twoClusterSpots } from './planning.test-data';

describe('construction', () => {
  describe('splitEvenly', () => {
    it('should give the extra items to the earlier parts', () => {
      expect(splitEvenly([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5], [6, 7]]);
    });

    it('should leave trailing parts empty when there are fewer items than parts', () => {
      expect(splitEvenly([1], 3)).toEqual([[1], [], []]);
    });
  });

  describe('geographicSweep', () => {
    it('should sort west to east, then south to north, then by id', () => {
      const spots = [
        makeSpot('b', 35.7, 139.7),
        makeSpot('c', 35.6, 139.8),
        makeSpot('a', 35.7, 139.7),
        makeSpot('d', 35.6, 139.7),
      ];

      expect(geographicSweep(spots).map(s => s.id)).toEqual(['d', 'a', 'b', 'c']);
      expect(spots.map(s => s.id)).toEqual(['b', 'c', 'a', 'd']);
    });
  });

  describe('nearestNeighborPath', () => {
    it('should start from the first spot and always visit the closest next', () => {
      const [m1, m2, , m4] = meridianSpots(4);

      expect(nearestNeighborPath([m2, m4, m1]).map(s => s.id)).toEqual(['m2', 'm1', 'm4']);
    });

    it('should return an empty path for no spots', () => {
      expect(nearestNeighborPath([])).toEqual([]);
    });
  });

  describe('constructItinerary', () => {
    it('should keep each geographic cluster on its own day', () => {
      const itinerary = constructItinerary('testville', twoClusterSpots(), 2);

      expect(itinerary).toEqual({
        cityId: 'testville',
        days: [
          { day: 1, spotIds: ['w1', 'w2', 'w3'] },
          { day: 2, spotIds: ['e1', 'e2', 'e3'] },
        ],
      });
    });

    it('should assign every spot exactly once', () => {
      const spots = meridianSpots(7);
      const itinerary = constructItinerary('testville', spots, 3);
      const assigned = itinerary.days.flatMap(d => d.spotIds);

      expect(itinerary.days.map(d => d.spotIds.length)).toEqual([3, 2, 2]);
      expect([...assigned].sort()).toEqual(spots.map(s => s.id).sort());
    });
  });
});
