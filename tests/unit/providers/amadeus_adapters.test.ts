import type Amadeus from 'amadeus';
import { lookupAirport } from '../../../src/providers/airports.js';
import { AmadeusFlightsAdapter, isoDurationHours } from '../../../src/providers/flights.js';
import { AmadeusHotelsAdapter, tierFor } from '../../../src/providers/hotels.js';
import type { GatherRequest } from '../../../src/providers/types.js';

type Params = Record<string, string | number | boolean>;
type Answer = (params: Params) => Promise<Amadeus.Response>;

const request: GatherRequest = {
  destination: 'Phuket',
  startDate: '2025-03-17',
  endDate: '2025-03-19',
  interests: [],
  currency: 'THB',
  travelers: 2,
  places: [],
};

const opts = () => ({ timeoutMs: 2000, signal: new AbortController().signal });

const unused: Answer = async () => {
  throw new Error('unexpected call');
};

function fakeClient(answers: { flights?: Answer; hotelList?: Answer; hotelOffers?: Answer }) {
  const flightOffersSearch = { get: jest.fn(answers.flights ?? unused) };
  const hotelOffersSearch = { get: jest.fn(answers.hotelOffers ?? unused) };
  const byCity = { get: jest.fn(answers.hotelList ?? unused) };
  const client: Amadeus = {
    shopping: { flightOffersSearch, hotelOffersSearch },
    referenceData: { locations: { hotels: { byCity } } },
  };
  return { client: () => client, flightOffersSearch, hotelOffersSearch, byCity };
}

describe('airports', () => {
  it('looks up city names and passes codes through', () => {
    expect(lookupAirport('Phuket')).toEqual({ airport: 'HKT', city: 'HKT' });
    expect(lookupAirport('BKK')).toEqual({ airport: 'BKK', city: 'BKK' });
    expect(lookupAirport('Atlantis')).toBeUndefined();
  });
});

describe('AmadeusFlightsAdapter', () => {
  it('searches from the default origin and maps offers', async () => {
    const fake = fakeClient({
      flights: async () => ({
        data: [
          {
            validatingAirlineCodes: ['TG'],
            price: { grandTotal: '4200.50', currency: 'THB' },
            itineraries: [
              {
                duration: 'PT1H25M',
                segments: [{ carrierCode: 'TG', departure: { iataCode: 'BKK' }, arrival: { iataCode: 'HKT' } }],
              },
            ],
          },
        ],
      }),
    });

    const outcome = await new AmadeusFlightsAdapter(fake.client, true, 'BKK').fetch(request, opts());

    expect(fake.flightOffersSearch.get).toHaveBeenCalledWith({
      originLocationCode: 'BKK',
      destinationLocationCode: 'HKT',
      departureDate: '2025-03-17',
      returnDate: '2025-03-19',
      adults: 2,
      currencyCode: 'THB',
      max: 5,
    });
    expect(outcome).toEqual({
      ok: true,
      payload: {
        source: 'flights',
        offers: [
          {
            carrier: 'TG',
            origin: 'BKK',
            destination: 'HKT',
            departureDate: '2025-03-17',
            returnDate: '2025-03-19',
            price: 4200.5,
            currency: 'THB',
            stops: 0,
            durationHours: 1.4,
            estimated: false,
          },
        ],
      },
    });
  });

  it('fails without an airport code for the destination', async () => {
    const fake = fakeClient({});
    const outcome = await new AmadeusFlightsAdapter(fake.client, true, 'BKK').fetch(
      { ...request, destination: 'Atlantis' },
      opts(),
    );
    expect(outcome).toEqual({ ok: false, failure: { kind: 'not_found', message: 'no_airport_code' } });
    expect(fake.flightOffersSearch.get).not.toHaveBeenCalled();
  });

  it('classifies SDK response errors by status', async () => {
    const fake = fakeClient({
      flights: async () => {
        throw Object.assign(new Error('[429]'), { response: { statusCode: 429 } });
      },
    });
    const outcome = await new AmadeusFlightsAdapter(fake.client, true, 'BKK').fetch(request, opts());
    expect(outcome).toEqual({ ok: false, failure: { kind: 'rate_limit', message: 'HTTP_429', status: 429 } });
  });

  it('parses ISO durations', () => {
    expect(isoDurationHours('PT2H35M')).toBe(2.6);
    expect(isoDurationHours('PT45M')).toBe(0.8);
    expect(isoDurationHours(undefined)).toBe(0);
  });
});

describe('AmadeusHotelsAdapter', () => {
  it('prices hotels per night and splits them into tiers', async () => {
    const fake = fakeClient({
      hotelList: async () => ({ data: [{ hotelId: 'H1' }, { hotelId: 'H2' }, { hotelId: 'H3' }] }),
      hotelOffers: async () => ({
        data: [
          { hotel: { name: 'Palm Court', rating: '4' }, offers: [{ price: { total: '3000', currency: 'THB' } }] },
          { hotel: { name: 'Cliff House' }, offers: [{ price: { total: '6000', currency: 'THB' } }] },
          { hotel: { name: 'Harbour Inn' }, offers: [{ price: { total: '1500', currency: 'THB' } }] },
        ],
      }),
    });

    const outcome = await new AmadeusHotelsAdapter(fake.client, true).fetch(request, opts());

    expect(fake.byCity.get).toHaveBeenCalledWith({ cityCode: 'HKT' });
    expect(fake.hotelOffersSearch.get).toHaveBeenCalledWith(
      expect.objectContaining({ hotelIds: 'H1,H2,H3', checkInDate: '2025-03-17', checkOutDate: '2025-03-19' }),
    );
    expect(outcome).toEqual({
      ok: true,
      payload: {
        source: 'hotels',
        offers: [
          { name: 'Harbour Inn', tier: 'budget', pricePerNight: 750, total: 1500, currency: 'THB', estimated: false },
          { name: 'Palm Court', tier: 'mid-range', pricePerNight: 1500, total: 3000, currency: 'THB', rating: 4, estimated: false },
          { name: 'Cliff House', tier: 'upscale', pricePerNight: 3000, total: 6000, currency: 'THB', estimated: false },
        ],
      },
    });
  });

  it('reports a city with no hotels as not found', async () => {
    const fake = fakeClient({ hotelList: async () => ({ data: [] }) });
    const outcome = await new AmadeusHotelsAdapter(fake.client, true).fetch(request, opts());
    expect(outcome).toEqual({ ok: false, failure: { kind: 'not_found', message: 'no_hotels' } });
  });

  it('leaves tiers unknown with fewer than three offers', () => {
    expect(tierFor(0, 2)).toBe('unknown');
    expect([0, 1, 2, 3, 4, 5].map((i) => tierFor(i, 6))).toEqual([
      'budget',
      'budget',
      'mid-range',
      'mid-range',
      'upscale',
      'upscale',
    ]);
  });
});
