// The Amadeus Node SDK ships no type declarations; only the calls used here are typed.
declare module 'amadeus' {
  namespace Amadeus {
    interface Options {
      clientId: string;
      clientSecret: string;
      hostname?: 'test' | 'production';
      logLevel?: 'silent' | 'warn' | 'debug';
      customAppId?: string;
      customAppVersion?: string;
    }

    interface Response {
      data: unknown;
      result?: unknown;
      statusCode?: number;
    }

    interface Endpoint {
      get(params: Record<string, string | number | boolean>): Promise<Response>;
    }
  }

  class Amadeus {
    constructor(options: Amadeus.Options);
    shopping: {
      flightOffersSearch: Amadeus.Endpoint;
      hotelOffersSearch: Amadeus.Endpoint;
    };
    referenceData: {
      locations: {
        hotels: {
          byCity: Amadeus.Endpoint;
        };
      };
    };
  }

  export = Amadeus;
}
