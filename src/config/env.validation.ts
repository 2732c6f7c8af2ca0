import { z } from 'zod';

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : undefined));

export const envSchema = z.object({
    OPENWEATHER_API_KEY: optionalString,
    ALPHA_VANTAGE_API_KEY: optionalString,
    NEWS_API_KEY: optionalString,
    OPENWEATHER_BASE_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),
    ALPHA_VANTAGE_BASE_URL: z.string().url().default('https://www.alphavantage.co/query'),
    NEWS_API_BASE_URL: z.string().url().default('https://newsapi.org/v2'),
    PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    NEWS_DEFAULT_COUNTRY: z.string().length(2).toLowerCase().default('us'),
    NEWS_PAGE_SIZE: z.coerce.number().int().min(1).max(20).default(5),
    GOOGLE_APPLICATION_CREDENTIALS: optionalString,
    GOOGLE_CLOUD_PROJECT: optionalString,
    SPEECH_LANGUAGE: z.string().default('en-US'),
    SPEECH_VOICE: z.string().default('en-US-Standard-A'),
    SESSION_CAPACITY: z.coerce.number().int().min(1).default(20),
    MAX_SESSIONS: z.coerce.number().int().min(1).default(1000),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    CORS_ORIGINS: z.string().default('*'),
});

export type AppEnv = z.infer<typeof envSchema>;

export const PROVIDER_KEYS = ['OPENWEATHER_API_KEY', 'ALPHA_VANTAGE_API_KEY', 'NEWS_API_KEY'] as const;

export function validateEnv(config: Record<string, unknown>): AppEnv {
    const parsed = envSchema.safeParse(config);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }
    return parsed.data;
}

export type ProviderKeys = Pick<AppEnv, (typeof PROVIDER_KEYS)[number]>;

export function missingProviderKeys(env: ProviderKeys): string[] {
    return PROVIDER_KEYS.filter(key => !env[key]);
}

export function corsOrigins(value: string): string[] | string {
    const origins = value.split(',').map(origin => origin.trim()).filter(Boolean);
    return origins.length === 1 ? origins[0] : origins;
}
