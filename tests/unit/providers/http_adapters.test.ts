import nock from 'nock';
import { GoogleImagesAdapter, imageQueries } from '../../../src/providers/images.js';
import { GoogleTransitAdapter } from '../../../src/providers/transit.js';
import type { GatherRequest } from '../../../src/providers/types.js';
import { OpenMeteoWeatherAdapter, weatherCodeToText } from '../../../src/providers/weather.js';

const request: GatherRequest = {
  destination: 'Phuket',
  startDate: '2025-03-17',
  endDate: '2025-03-18',
  interests: ['beaches'],
  currency: 'THB',
  travelers: 2,
  places: ['Phuket city centre', 'Phuket beaches'],
};

const opts = () => ({ timeoutMs: 2000, signal: new AbortController().signal });

beforeAll(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
});

afterAll(() => {
  nock.enableNetConnect();
});

describe('OpenMeteoWeatherAdapter', () => {
  it('geocodes the destination and maps the daily forecast', async () => {
    const geo = nock('https://geocoding-api.open-meteo.com')
      .get('/v1/search')
      .query(true)
      .reply(200, { results: [{ name: 'Phuket', latitude: 7.88, longitude: 98.39 }] });
    const forecast = nock('https://api.open-meteo.com')
      .get('/v1/forecast')
      .query((q) => q.latitude === '7.88' && q.start_date === '2025-03-17' && q.end_date === '2025-03-18')
      .reply(200, {
        daily: {
          time: ['2025-03-17', '2025-03-18'],
          weathercode: [0, 63],
          temperature_2m_max: [33.1, 31.4],
          temperature_2m_min: [25.2, null],
          precipitation_sum: [0, 12.5],
        },
      });

    const outcome = await new OpenMeteoWeatherAdapter().fetch(request, opts());

    expect(outcome).toEqual({
      ok: true,
      payload: {
        source: 'weather',
        days: [
          { date: '2025-03-17', highC: 33.1, lowC: 25.2, precipitationMm: 0, condition: 'Clear sky', estimated: false },
          { date: '2025-03-18', highC: 31.4, lowC: 0, precipitationMm: 12.5, condition: 'Rain', estimated: false },
        ],
      },
    });
    geo.done();
    forecast.done();
  });

  it('reports an unknown destination as not found', async () => {
    nock('https://geocoding-api.open-meteo.com').get('/v1/search').query(true).reply(200, {});
    const outcome = await new OpenMeteoWeatherAdapter().fetch(request, opts());
    expect(outcome).toEqual({ ok: false, failure: { kind: 'not_found', message: 'destination_not_geocoded' } });
  });

  it('classifies server errors', async () => {
    nock('https://geocoding-api.open-meteo.com')
      .get('/v1/search')
      .query(true)
      .reply(200, { results: [{ name: 'Phuket', latitude: 7.88, longitude: 98.39 }] });
    nock('https://api.open-meteo.com').get('/v1/forecast').query(true).reply(503, 'unavailable');

    const outcome = await new OpenMeteoWeatherAdapter().fetch(request, opts());
    expect(outcome).toEqual({ ok: false, failure: { kind: 'server_error', message: 'HTTP_503', status: 503 } });
  });

  it('names weather codes', () => {
    expect([0, 2, 3, 45, 53, 65, 75, 81, 85, 95, null].map(weatherCodeToText)).toEqual([
      'Clear sky',
      'Partly cloudy',
      'Overcast',
      'Fog',
      'Drizzle',
      'Rain',
      'Snow',
      'Rain showers',
      'Snow showers',
      'Thunderstorm',
      'Unknown',
    ]);
  });
});

describe('GoogleTransitAdapter', () => {
  it('is unconfigured without a key', () => {
    expect(new GoogleTransitAdapter(undefined).configured).toBe(false);
  });

  it('turns directions into one leg per consecutive pair of places', async () => {
    nock('https://maps.googleapis.com')
      .get('/maps/api/directions/json')
      .query((q) => q.mode === 'transit' && q.key === 'test-key')
      .reply(200, {
        status: 'OK',
        routes: [{ summary: 'Bus 8', legs: [{ duration: { value: 1500 }, distance: { value: 9000 } }] }],
      });

    const outcome = await new GoogleTransitAdapter('test-key').fetch(request, opts());
    expect(outcome).toEqual({
      ok: true,
      payload: {
        source: 'transit',
        legs: [
          {
            from: 'Phuket city centre',
            to: 'Phuket beaches',
            durationMinutes: 25,
            distanceMeters: 9000,
            mode: 'transit',
            summary: 'Bus 8',
            estimated: false,
          },
        ],
      },
    });
  });

  it('maps a denied request to an auth failure', async () => {
    nock('https://maps.googleapis.com')
      .get('/maps/api/directions/json')
      .query(true)
      .reply(200, { status: 'REQUEST_DENIED', error_message: 'The provided API key is invalid.', routes: [] });

    const outcome = await new GoogleTransitAdapter('test-key').fetch(request, opts());
    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'auth_error', message: 'The provided API key is invalid.' },
    });
  });
});

describe('GoogleImagesAdapter', () => {
  it('needs both the key and the engine id', () => {
    expect(new GoogleImagesAdapter('test-key', undefined).configured).toBe(false);
    expect(new GoogleImagesAdapter('test-key', 'test-engine').configured).toBe(true);
  });

  it('queries the destination and each interest', async () => {
    expect(imageQueries(request)).toEqual(['Phuket', 'Phuket beaches']);
    nock('https://www.googleapis.com')
      .get('/customsearch/v1')
      .query((q) => q.q === 'Phuket')
      .reply(200, { items: [{ link: 'https://img.test/phuket.jpg', title: 'Phuket bay' }] });
    nock('https://www.googleapis.com')
      .get('/customsearch/v1')
      .query((q) => q.q === 'Phuket beaches')
      .reply(200, {});

    const outcome = await new GoogleImagesAdapter('test-key', 'test-engine').fetch(request, opts());
    expect(outcome).toEqual({
      ok: true,
      payload: {
        source: 'images',
        images: [
          { query: 'Phuket', url: 'https://img.test/phuket.jpg', title: 'Phuket bay', estimated: false },
          { query: 'Phuket beaches', url: null, title: 'Phuket beaches', estimated: false },
        ],
      },
    });
  });
});
