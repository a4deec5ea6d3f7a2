import type { PlannerConfig } from '../config/planner.js';
import { amadeusClientFactory, amadeusCredentials, hasAmadeusCredentials } from './amadeus_client.js';
import { AmadeusFlightsAdapter } from './flights.js';
import { AmadeusHotelsAdapter } from './hotels.js';
import { GoogleImagesAdapter } from './images.js';
import { GoogleTransitAdapter } from './transit.js';
import type { AdapterSet } from './types.js';
import { OpenMeteoWeatherAdapter } from './weather.js';

/** The live adapter for every source, configured from the environment. */
export function createDefaultAdapters(cfg: PlannerConfig, env: NodeJS.ProcessEnv = process.env): AdapterSet {
  const creds = amadeusCredentials(env);
  const amadeus = amadeusClientFactory(creds);
  const amadeusReady = hasAmadeusCredentials(creds);

  return {
    weather: new OpenMeteoWeatherAdapter(),
    flights: new AmadeusFlightsAdapter(amadeus, amadeusReady, cfg.defaultOrigin),
    hotels: new AmadeusHotelsAdapter(amadeus, amadeusReady),
    transit: new GoogleTransitAdapter(env.GOOGLE_MAPS_API_KEY),
    images: new GoogleImagesAdapter(env.GOOGLE_CSE_KEY, env.GOOGLE_CSE_ID),
  };
}
