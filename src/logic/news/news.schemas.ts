import { z } from 'zod';

export const articleSchema = z.object({
    source: z.object({ id: z.string().nullish(), name: z.string().nullish() }).nullish(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    url: z.string().nullish(),
    publishedAt: z.string().nullish(),
});

export const newsResponseSchema = z.discriminatedUnion('status', [
    z.object({
        status: z.literal('ok'),
        totalResults: z.number().default(0),
        articles: z.array(articleSchema).default([]),
    }),
    z.object({
        status: z.literal('error'),
        code: z.string().default('unexpectedError'),
        message: z.string().default(''),
    }),
]);
