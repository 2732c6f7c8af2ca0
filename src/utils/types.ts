export enum Intent {
    Weather = 'weather',
    Stock = 'stock',
    News = 'news',
    Unknown = 'unknown',
}

export type RoutableIntent = Exclude<Intent, Intent.Unknown>;

export interface Entity {
    intent: RoutableIntent;
    value: string;
}

export type Classification =
    | { intent: Intent.Weather; entity?: Entity; forecastDays?: number }
    | { intent: Intent.Stock; entity?: Entity }
    | { intent: Intent.News; entity?: Entity }
    | { intent: Intent.Unknown };

export function entityOf(classification: Classification): Entity | undefined {
    return classification.intent === Intent.Unknown ? undefined : classification.entity;
}

export type UtteranceSource = 'typed' | 'transcribed';

export interface Utterance {
    readonly text: string;
    readonly source: UtteranceSource;
    readonly receivedAt: Date;
}

export function createUtterance(text: string, source: UtteranceSource = 'typed', receivedAt = new Date()): Utterance {
    return Object.freeze({ text, source, receivedAt });
}

export enum FailureReason {
    NotFound = 'not_found',
    RateLimited = 'rate_limited',
    Unreachable = 'unreachable',
    InvalidKey = 'invalid_key',
}

export interface TemperatureReading {
    current: number;
    feelsLike: number;
    min: number;
    max: number;
}

export interface WeatherReading {
    kind: 'weather';
    city: string;
    country?: string;
    description: string;
    temperature: TemperatureReading;
    humidity: number;
    pressure: number;
    windSpeed: number;
    observedAt?: number;
}

export interface ForecastEntry {
    time: number;
    description: string;
    temperature: number;
    humidity: number;
    windSpeed: number;
}

export interface WeatherForecast {
    kind: 'forecast';
    city: string;
    country?: string;
    entries: ForecastEntry[];
}

export interface StockQuote {
    kind: 'quote';
    symbol: string;
    open: number;
    high: number;
    low: number;
    price: number;
    volume: number;
    latestTradingDay?: string;
    previousClose: number;
    change: number;
    changePercent: string;
}

export interface Headline {
    title: string;
    description?: string;
    url?: string;
    source?: string;
    publishedAt?: string;
}

export interface HeadlineList {
    kind: 'headlines';
    totalResults: number;
    articles: Headline[];
}

export type ServicePayload = WeatherReading | WeatherForecast | StockQuote | HeadlineList;

export interface ServiceSuccess<T> {
    ok: true;
    payload: T;
}

export interface ServiceFailure {
    ok: false;
    reason: FailureReason;
    detail?: string;
}

export type ServiceResult<T = ServicePayload> = ServiceSuccess<T> | ServiceFailure;

export function success<T>(payload: T): ServiceSuccess<T> {
    return { ok: true, payload };
}

export function failure(reason: FailureReason, detail?: string): ServiceFailure {
    return detail === undefined ? { ok: false, reason } : { ok: false, reason, detail };
}

/**
 * A data provider behind one routable intent. Implementations resolve every
 * outcome, including transport errors, into a `ServiceResult`.
 */
export interface ServiceClient<T extends ServicePayload = ServicePayload> {
    fetch(entity?: string): Promise<ServiceResult<T>>;
}

export interface SynthesizedAudio {
    audioData: string;
    format: AudioOutputFormat;
    voice: string;
    language: string;
}

export type AudioOutputFormat = 'mp3' | 'wav' | 'ogg';

export interface Turn {
    readonly seq: number;
    readonly utterance: Utterance;
    readonly intent: Intent;
    readonly entity?: Entity;
    readonly result?: ServiceResult;
    readonly text: string;
    readonly audio?: SynthesizedAudio;
}

export type TurnDraft = Omit<Turn, 'seq'>;

export function assertNever(value: never): never {
    throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
