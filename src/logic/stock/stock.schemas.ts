import { z } from 'zod';

const numeric = z.coerce.number();

export const globalQuoteSchema = z.object({
    '01. symbol': z.string(),
    '02. open': numeric,
    '03. high': numeric,
    '04. low': numeric,
    '05. price': numeric,
    '06. volume': numeric,
    '07. latest trading day': z.string().optional(),
    '08. previous close': numeric,
    '09. change': numeric,
    '10. change percent': z.string().default('0%'),
});

export const quoteResponseSchema = z.object({
    'Global Quote': z.union([globalQuoteSchema, z.object({}).strict()]),
});

export const symbolSearchSchema = z.object({
    bestMatches: z.array(z.object({
        '1. symbol': z.string(),
        '2. name': z.string(),
        '3. type': z.string().optional(),
        '4. region': z.string().optional(),
        '8. currency': z.string().optional(),
        '9. matchScore': z.coerce.number().optional(),
    })),
});

/** Alpha Vantage reports throttling and key problems in a 200 body. */
export const providerNoticeSchema = z.object({
    'Note': z.string().optional(),
    'Information': z.string().optional(),
    'Error Message': z.string().optional(),
});
