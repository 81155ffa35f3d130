// src/itinerary-planning/__tests__/weather-replanner.service.spec.ts

import { Test, TestingModule } from '@nestjs/testing';
import { WeatherReplannerService } from '../replanning/weather-replanner.service';
import { catalogOf, itineraryOf, makeSpot } from './planning.test-data';

describe('WeatherReplannerService', () => {
  let service: WeatherReplannerService;

  const catalog = catalogOf([
    makeSpot('park1', 35.68, 139.76, { category: 'park' }),
    makeSpot('food1', 35.68, 139.76, { category: 'food' }),
    makeSpot('museum1', 35.69, 139.77, { category: 'museum' }),
    makeSpot('temple1', 35.69, 139.77, { category: 'temple' }),
  ]);

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [WeatherReplannerService],
    }).compile();

    service = module.get<WeatherReplannerService>(WeatherReplannerService);
  });

  it('should swap a rainy-day outdoor spot with an indoor spot from a dry day', () => {
    const itinerary = itineraryOf('testville', ['park1', 'food1'], ['museum1', 'temple1']);

    const result = service.replanForRain(catalog, itinerary, [1]);

    expect(result.itinerary.days.map(d => d.spotIds)).toEqual([
      ['museum1', 'food1'],
      ['park1', 'temple1'],
    ]);
    expect(result.swaps).toEqual([
      { rainyDay: 1, outdoorSpotId: 'park1', dryDay: 2, indoorSpotId: 'museum1' },
    ]);
    expect(result.unresolved).toEqual([]);
    expect(itinerary.days[0].spotIds).toEqual(['park1', 'food1']);
  });

  it('should leave the itinerary alone when the rainy day has no outdoor spots', () => {
    const itinerary = itineraryOf('testville', ['park1', 'food1'], ['museum1', 'temple1']);

    const result = service.replanForRain(catalog, itinerary, [2]);

    expect(result.itinerary).toEqual(itinerary);
    expect(result.swaps).toEqual([]);
  });

  it('should report outdoor spots that cannot be moved indoors', () => {
    const itinerary = itineraryOf('testville', ['park1', 'food1'], ['museum1', 'temple1']);

    const result = service.replanForRain(catalog, itinerary, [1, 2]);

    expect(result.itinerary).toEqual(itinerary);
    expect(result.unresolved).toEqual([{ day: 1, spotId: 'park1' }]);
  });
});
