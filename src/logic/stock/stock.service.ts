import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderRequest } from '../../utils/providerRequest';
import { FailureReason, ServiceClient, ServiceFailure, ServiceResult, StockQuote, failure, success } from '../../utils/types';
import { globalQuoteSchema, providerNoticeSchema, quoteResponseSchema, symbolSearchSchema } from './stock.schemas';
import { StockMatch } from './stock.types';

/**
 * Maps an Alpha Vantage body-level notice to a failure, or undefined when the
 * body carries none.
 */
export function noticeFailure(body: unknown): ServiceFailure | undefined {
    const parsed = providerNoticeSchema.safeParse(body);
    if (!parsed.success) return undefined;
    const notice = parsed.data;
    const message = notice['Error Message'] ?? notice['Information'] ?? notice['Note'];
    if (!message) return undefined;

    if (/api ?key/i.test(message)) {
        return failure(FailureReason.InvalidKey, message);
    }
    if (/frequency|rate limit|requests per|premium/i.test(message)) {
        return failure(FailureReason.RateLimited, message);
    }
    if (notice['Error Message']) {
        return failure(FailureReason.NotFound, message);
    }
    return failure(FailureReason.RateLimited, message);
}

@Injectable()
export class StockService implements ServiceClient<StockQuote> {
    private readonly request: ProviderRequest;
    private readonly apiKey?: string;

    constructor(private readonly configService: ConfigService) {
        this.apiKey = this.configService.get<string>('ALPHA_VANTAGE_API_KEY');
        this.request = new ProviderRequest({
            service: 'stock',
            baseUrl: this.configService.get<string>('ALPHA_VANTAGE_BASE_URL') || 'https://www.alphavantage.co/query',
            timeoutMs: this.configService.get<number>('PROVIDER_TIMEOUT_MS') ?? 10000,
            secretParams: ['apikey'],
        });
    }

    async fetch(entity?: string): Promise<ServiceResult<StockQuote>> {
        const symbol = entity?.trim().toUpperCase();
        if (!symbol) {
            return failure(FailureReason.NotFound, 'no ticker given');
        }
        if (!this.apiKey) {
            return failure(FailureReason.InvalidKey, 'ALPHA_VANTAGE_API_KEY is not configured');
        }

        const res = await this.request.getJson('', { function: 'GLOBAL_QUOTE', symbol, apikey: this.apiKey });
        if (!res.ok) return res;

        const notice = noticeFailure(res.payload);
        if (notice) return notice;

        const parsed = quoteResponseSchema.safeParse(res.payload);
        if (!parsed.success) {
            return failure(FailureReason.Unreachable, `unexpected quote payload for ${symbol}`);
        }
        const quote = globalQuoteSchema.safeParse(parsed.data['Global Quote']);
        if (!quote.success) {
            return failure(FailureReason.NotFound, `no quote for ${symbol}`);
        }
        const q = quote.data;
        return success({
            kind: 'quote',
            symbol: q['01. symbol'],
            open: q['02. open'],
            high: q['03. high'],
            low: q['04. low'],
            price: q['05. price'],
            volume: q['06. volume'],
            latestTradingDay: q['07. latest trading day'],
            previousClose: q['08. previous close'],
            change: q['09. change'],
            changePercent: q['10. change percent'],
        });
    }

    async search(keywords: string): Promise<ServiceResult<StockMatch[]>> {
        const term = keywords.trim();
        if (!term) {
            return failure(FailureReason.NotFound, 'no search keywords given');
        }
        if (!this.apiKey) {
            return failure(FailureReason.InvalidKey, 'ALPHA_VANTAGE_API_KEY is not configured');
        }

        const res = await this.request.getJson('', { function: 'SYMBOL_SEARCH', keywords: term, apikey: this.apiKey });
        if (!res.ok) return res;

        const notice = noticeFailure(res.payload);
        if (notice) return notice;

        const parsed = symbolSearchSchema.safeParse(res.payload);
        if (!parsed.success || parsed.data.bestMatches.length === 0) {
            return failure(FailureReason.NotFound, `no symbols match ${term}`);
        }
        return success(parsed.data.bestMatches.map(match => ({
            symbol: match['1. symbol'],
            name: match['2. name'],
            type: match['3. type'],
            region: match['4. region'],
            currency: match['8. currency'],
            matchScore: match['9. matchScore'],
        })));
    }
}
