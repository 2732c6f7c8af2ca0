import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { WeatherService, dailyReadings, locationQuery } from './weather.service';
import { FailureReason } from '../../utils/types';

const BASE_URL = 'https://weather.test/data/2.5';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

async function createService(config: Record<string, unknown>): Promise<WeatherService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [WeatherService, { provide: ConfigService, useValue: new ConfigService(config) }],
  }).compile();
  return module.get<WeatherService>(WeatherService);
}

const forecastItem = (dt: number, description: string, temp: number, humidity: number, speed: number) => ({
  dt,
  weather: [{ description }],
  main: { temp, humidity, pressure: 1000 },
  wind: { speed },
});

// 2024-01-01 09:00, 12:00, 15:00 UTC and 2024-01-02 00:00, 12:00 UTC
const FORECAST_LIST = [
  forecastItem(1704099600, 'mist', 2, 95, 1),
  forecastItem(1704110400, 'clear sky', 5, 60, 3),
  forecastItem(1704121200, 'few clouds', 4, 65, 2),
  forecastItem(1704153600, 'light snow', -3, 92, 5),
  forecastItem(1704196800, 'snow', -1.5, 90, 6),
];

describe('WeatherService', () => {
  let service: WeatherService;
  let fetchSpy: jest.SpyInstance;

  beforeEach(async () => {
    service = await createService({ OPENWEATHER_API_KEY: 'test-secret', OPENWEATHER_BASE_URL: BASE_URL, PROVIDER_TIMEOUT_MS: 1000 });
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('maps the current conditions', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({
      name: 'Paris',
      dt: 1700000000,
      sys: { country: 'FR' },
      weather: [{ description: 'light rain' }],
      main: { temp: 12.34, feels_like: 11, temp_min: 10, temp_max: 14, humidity: 80, pressure: 1005 },
      wind: { speed: 4.16 },
    }));

    const result = await service.fetch('Paris, France');

    expect(String(fetchSpy.mock.calls[0][0])).toBe(`${BASE_URL}/weather?q=Paris%2CFrance&units=metric&appid=test-secret`);
    expect(result).toEqual({
      ok: true,
      payload: {
        kind: 'weather',
        city: 'Paris',
        country: 'FR',
        description: 'light rain',
        temperature: { current: 12.3, feelsLike: 11, min: 10, max: 14 },
        humidity: 80,
        pressure: 1005,
        windSpeed: 4.2,
        observedAt: 1700000000,
      },
    });
  });

  it('reports a missing key without calling the provider', async () => {
    const keyless = await createService({ OPENWEATHER_BASE_URL: BASE_URL });

    const result = await keyless.fetch('Paris');

    expect(result).toEqual({ ok: false, reason: FailureReason.InvalidKey, detail: 'OPENWEATHER_API_KEY is not configured' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('reports NotFound without a city', async () => {
    expect(await service.fetch('  ')).toEqual({ ok: false, reason: FailureReason.NotFound, detail: 'no city given' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('maps HTTP statuses to failure reasons', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ cod: '404', message: 'city not found' }, 404));
    expect(await service.fetch('Atlantis')).toEqual({
      ok: false,
      reason: FailureReason.NotFound,
      detail: '404 {"cod":"404","message":"city not found"}',
    });

    fetchSpy.mockResolvedValueOnce(jsonResponse({ cod: 401 }, 401));
    expect(await service.fetch('Paris')).toMatchObject({ ok: false, reason: FailureReason.InvalidKey });

    fetchSpy.mockResolvedValueOnce(jsonResponse({ cod: 429 }, 429));
    expect(await service.fetch('Paris')).toMatchObject({ ok: false, reason: FailureReason.RateLimited });

    fetchSpy.mockResolvedValueOnce(jsonResponse({ cod: 503 }, 503));
    expect(await service.fetch('Paris')).toMatchObject({ ok: false, reason: FailureReason.Unreachable });
  });

  it('maps network errors to Unreachable', async () => {
    fetchSpy.mockRejectedValue(new Error('getaddrinfo ENOTFOUND weather.test'));

    expect(await service.fetch('Paris')).toEqual({
      ok: false,
      reason: FailureReason.Unreachable,
      detail: 'getaddrinfo ENOTFOUND weather.test',
    });
  });

  it('maps an unexpected body to Unreachable', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ unexpected: true }));

    expect(await service.fetch('Paris')).toEqual({
      ok: false,
      reason: FailureReason.Unreachable,
      detail: 'unexpected weather payload for Paris',
    });
  });

  describe('fetchForecast', () => {
    it('requests enough readings and keeps the midday one per day', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ city: { name: 'Oslo', country: 'NO' }, list: FORECAST_LIST }));

      const result = await service.fetchForecast('Oslo', 2);

      expect(String(fetchSpy.mock.calls[0][0])).toBe(`${BASE_URL}/forecast?q=Oslo&units=metric&cnt=16&appid=test-secret`);
      expect(result).toEqual({
        ok: true,
        payload: {
          kind: 'forecast',
          city: 'Oslo',
          country: 'NO',
          entries: [
            { time: 1704110400, description: 'clear sky', temperature: 5, humidity: 60, windSpeed: 3 },
            { time: 1704196800, description: 'snow', temperature: -1.5, humidity: 90, windSpeed: 6 },
          ],
        },
      });
    });

    it('caps the reading count at five days', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ city: { name: 'Oslo' }, list: FORECAST_LIST }));

      await service.fetchForecast('Oslo', 9);

      expect(new URL(String(fetchSpy.mock.calls[0][0])).searchParams.get('cnt')).toBe('40');
    });

    it('reports NotFound when the provider returns no readings', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ city: { name: 'Oslo' }, list: [] }));

      expect(await service.fetchForecast('Oslo', 3)).toEqual({
        ok: false,
        reason: FailureReason.NotFound,
        detail: 'no forecast readings for Oslo',
      });
    });
  });
});

describe('weather helpers', () => {
  it('joins city and country without spaces', () => {
    expect(locationQuery(' Paris ,  France ')).toBe('Paris,France');
    expect(locationQuery('Tokyo')).toBe('Tokyo');
  });

  it('limits daily readings to the requested day count', () => {
    expect(dailyReadings(FORECAST_LIST, 1).map(entry => entry.description)).toEqual(['clear sky']);
  });
});
