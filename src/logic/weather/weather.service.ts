import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderRequest } from '../../utils/providerRequest';
import { round1 } from '../../utils/numbers';
import {
    FailureReason,
    ForecastEntry,
    ServiceClient,
    ServiceResult,
    WeatherForecast,
    WeatherReading,
    failure,
    success,
} from '../../utils/types';
import { ForecastResponse, currentWeatherSchema, forecastSchema } from './weather.schemas';

const READINGS_PER_DAY = 8;
const MAX_FORECAST_READINGS = 40;

/** "Paris, France" -> "Paris,France", the form OpenWeatherMap's `q` expects. */
export function locationQuery(entity: string): string {
    return entity
        .split(',')
        .map(part => part.trim())
        .filter(Boolean)
        .join(',');
}

/**
 * One reading per calendar day (UTC), the one closest to midday, in list order.
 */
export function dailyReadings(list: ForecastResponse['list'], days: number): ForecastEntry[] {
    const byDay = new Map<string, ForecastResponse['list'][number]>();
    for (const item of list) {
        const time = new Date(item.dt * 1000);
        const day = time.toISOString().slice(0, 10);
        const current = byDay.get(day);
        const distance = Math.abs(time.getUTCHours() - 12);
        if (!current || distance < Math.abs(new Date(current.dt * 1000).getUTCHours() - 12)) {
            byDay.set(day, item);
        }
    }
    return [...byDay.values()].slice(0, days).map(item => ({
        time: item.dt,
        description: item.weather[0]?.description ?? '',
        temperature: round1(item.main.temp),
        humidity: item.main.humidity,
        windSpeed: round1(item.wind.speed),
    }));
}

@Injectable()
export class WeatherService implements ServiceClient<WeatherReading> {
    private readonly request: ProviderRequest;
    private readonly apiKey?: string;

    constructor(private readonly configService: ConfigService) {
        this.apiKey = this.configService.get<string>('OPENWEATHER_API_KEY');
        this.request = new ProviderRequest({
            service: 'weather',
            baseUrl: this.configService.get<string>('OPENWEATHER_BASE_URL') || 'https://api.openweathermap.org/data/2.5',
            timeoutMs: this.configService.get<number>('PROVIDER_TIMEOUT_MS') ?? 10000,
            secretParams: ['appid'],
        });
    }

    async fetch(entity?: string): Promise<ServiceResult<WeatherReading>> {
        const city = entity?.trim();
        if (!city) {
            return failure(FailureReason.NotFound, 'no city given');
        }
        if (!this.apiKey) {
            return failure(FailureReason.InvalidKey, 'OPENWEATHER_API_KEY is not configured');
        }

        const res = await this.request.getJson('/weather', {
            q: locationQuery(city),
            units: 'metric',
            appid: this.apiKey,
        });
        if (!res.ok) return res;

        const parsed = currentWeatherSchema.safeParse(res.payload);
        if (!parsed.success) {
            return failure(FailureReason.Unreachable, `unexpected weather payload for ${city}`);
        }
        const data = parsed.data;
        return success({
            kind: 'weather',
            city: data.name,
            country: data.sys.country,
            description: data.weather[0]?.description ?? '',
            temperature: {
                current: round1(data.main.temp),
                feelsLike: round1(data.main.feels_like ?? data.main.temp),
                min: round1(data.main.temp_min ?? data.main.temp),
                max: round1(data.main.temp_max ?? data.main.temp),
            },
            humidity: data.main.humidity,
            pressure: data.main.pressure,
            windSpeed: round1(data.wind.speed),
            observedAt: data.dt,
        });
    }

    async fetchForecast(entity: string | undefined, days: number): Promise<ServiceResult<WeatherForecast>> {
        const city = entity?.trim();
        if (!city) {
            return failure(FailureReason.NotFound, 'no city given');
        }
        if (!this.apiKey) {
            return failure(FailureReason.InvalidKey, 'OPENWEATHER_API_KEY is not configured');
        }

        const res = await this.request.getJson('/forecast', {
            q: locationQuery(city),
            units: 'metric',
            cnt: Math.min(days * READINGS_PER_DAY, MAX_FORECAST_READINGS),
            appid: this.apiKey,
        });
        if (!res.ok) return res;

        const parsed = forecastSchema.safeParse(res.payload);
        if (!parsed.success) {
            return failure(FailureReason.Unreachable, `unexpected forecast payload for ${city}`);
        }
        const entries = dailyReadings(parsed.data.list, days);
        if (entries.length === 0) {
            return failure(FailureReason.NotFound, `no forecast readings for ${city}`);
        }
        return success({
            kind: 'forecast',
            city: parsed.data.city.name,
            country: parsed.data.city.country,
            entries,
        });
    }
}
