import { z } from 'zod';

const condition = z.object({ description: z.string().default('') });

const main = z.object({
    temp: z.number(),
    feels_like: z.number().optional(),
    temp_min: z.number().optional(),
    temp_max: z.number().optional(),
    humidity: z.number().default(0),
    pressure: z.number().default(0),
});

const wind = z.object({ speed: z.number().default(0) }).default({ speed: 0 });

export const currentWeatherSchema = z.object({
    name: z.string(),
    dt: z.number().optional(),
    sys: z.object({ country: z.string().optional() }).default({}),
    weather: z.array(condition).default([]),
    main,
    wind,
});

export const forecastSchema = z.object({
    city: z.object({ name: z.string(), country: z.string().optional() }),
    list: z.array(z.object({
        dt: z.number(),
        weather: z.array(condition).default([]),
        main,
        wind,
    })),
});

export type ForecastResponse = z.infer<typeof forecastSchema>;
