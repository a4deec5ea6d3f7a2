import Amadeus from 'amadeus';
import { createLogger } from '../util/logging.js';

const log = createLogger({ component: 'amadeus' });

export interface AmadeusCredentials {
  clientId?: string;
  clientSecret?: string;
  hostname?: 'test' | 'production';
}

export function amadeusCredentials(env: NodeJS.ProcessEnv = process.env): AmadeusCredentials {
  return {
    clientId: env.AMADEUS_CLIENT_ID,
    clientSecret: env.AMADEUS_CLIENT_SECRET,
    hostname: env.AMADEUS_HOSTNAME === 'production' ? 'production' : 'test',
  };
}

export function hasAmadeusCredentials(creds: AmadeusCredentials): boolean {
  return Boolean(creds.clientId && creds.clientSecret);
}

/**
 * Lazily builds one SDK client per credential set and reuses it.
 */
export function amadeusClientFactory(creds: AmadeusCredentials): () => Amadeus {
  let client: Amadeus | undefined;
  return () => {
    if (client) return client;
    if (!creds.clientId || !creds.clientSecret) {
      throw new Error('AMADEUS_CLIENT_ID and AMADEUS_CLIENT_SECRET required');
    }
    log.info({ hostname: creds.hostname ?? 'test' }, 'amadeus:init');
    client = new Amadeus({
      clientId: creds.clientId,
      clientSecret: creds.clientSecret,
      hostname: creds.hostname ?? 'test',
      logLevel: 'silent',
      customAppId: 'trip-orchestrator',
      customAppVersion: process.env.APP_VERSION ?? 'dev',
    });
    return client;
  };
}
