import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderRequest, QueryParams } from '../../utils/providerRequest';
import { FailureReason, Headline, HeadlineList, ServiceClient, ServiceResult, failure, success } from '../../utils/types';
import countryTable from './data/countries.json';
import { newsResponseSchema } from './news.schemas';

export const NEWS_CATEGORIES = ['business', 'entertainment', 'general', 'health', 'science', 'sports', 'technology'] as const;

export type NewsCategory = (typeof NEWS_CATEGORIES)[number];

export const NEWS_COUNTRIES: Readonly<Record<string, string>> = countryTable.countries;

const COUNTRY_ALIASES: Readonly<Record<string, string>> = countryTable.aliases;

// NewsAPI keeps deleted articles in results with this placeholder title.
const REMOVED_TITLE = '[Removed]';

export function asCategory(topic: string): NewsCategory | undefined {
    const key = topic.trim().toLowerCase();
    return NEWS_CATEGORIES.find(category => category === key);
}

/** Two-letter code for a country name or common alias, ignoring a leading "the". */
export function countryCode(name: string): string | undefined {
    const key = name.trim().toLowerCase().replace(/^the\s+/, '');
    if (COUNTRY_ALIASES[key]) {
        return COUNTRY_ALIASES[key];
    }
    return Object.keys(NEWS_COUNTRIES).find(code => NEWS_COUNTRIES[code].toLowerCase() === key);
}

export function newsFailureReason(code: string): FailureReason {
    if (code.startsWith('apiKey')) return FailureReason.InvalidKey;
    if (code === 'rateLimited') return FailureReason.RateLimited;
    if (code === 'unexpectedError') return FailureReason.Unreachable;
    return FailureReason.NotFound;
}

@Injectable()
export class NewsService implements ServiceClient<HeadlineList> {
    private readonly request: ProviderRequest;
    private readonly apiKey?: string;
    private readonly defaultCountry: string;
    private readonly pageSize: number;

    constructor(private readonly configService: ConfigService) {
        this.apiKey = this.configService.get<string>('NEWS_API_KEY');
        this.defaultCountry = this.configService.get<string>('NEWS_DEFAULT_COUNTRY') || 'us';
        this.pageSize = this.configService.get<number>('NEWS_PAGE_SIZE') ?? 5;
        this.request = new ProviderRequest({
            service: 'news',
            baseUrl: this.configService.get<string>('NEWS_API_BASE_URL') || 'https://newsapi.org/v2',
            timeoutMs: this.configService.get<number>('PROVIDER_TIMEOUT_MS') ?? 10000,
            secretParams: ['apiKey'],
        });
    }

    /**
     * No topic: top headlines for the default country. A category or a
     * country name narrows the top headlines; anything else is a search.
     */
    async fetch(entity?: string): Promise<ServiceResult<HeadlineList>> {
        const topic = entity?.trim();
        if (!topic) {
            return this.topHeadlines();
        }
        const category = asCategory(topic);
        if (category) {
            return this.topHeadlines(this.defaultCountry, category);
        }
        const country = countryCode(topic);
        if (country) {
            return this.topHeadlines(country);
        }
        return this.search(topic);
    }

    async topHeadlines(country = this.defaultCountry, category?: NewsCategory): Promise<ServiceResult<HeadlineList>> {
        return this.query('/top-headlines', {
            country: country.toLowerCase(),
            category,
            pageSize: this.pageSize,
        });
    }

    async search(query: string): Promise<ServiceResult<HeadlineList>> {
        return this.query('/everything', {
            q: query,
            language: 'en',
            sortBy: 'publishedAt',
            pageSize: this.pageSize,
        });
    }

    categories(): readonly NewsCategory[] {
        return NEWS_CATEGORIES;
    }

    countries(): Readonly<Record<string, string>> {
        return NEWS_COUNTRIES;
    }

    private async query(path: string, params: QueryParams): Promise<ServiceResult<HeadlineList>> {
        if (!this.apiKey) {
            return failure(FailureReason.InvalidKey, 'NEWS_API_KEY is not configured');
        }

        const res = await this.request.getJson(path, { ...params, apiKey: this.apiKey });
        if (!res.ok) return res;

        const parsed = newsResponseSchema.safeParse(res.payload);
        if (!parsed.success) {
            return failure(FailureReason.Unreachable, 'unexpected news payload');
        }
        const body = parsed.data;
        if (body.status === 'error') {
            return failure(newsFailureReason(body.code), body.message || body.code);
        }

        const articles: Headline[] = body.articles
            .filter(article => article.title && article.title !== REMOVED_TITLE)
            .map(article => ({
                title: article.title ?? '',
                description: article.description ?? undefined,
                url: article.url ?? undefined,
                source: article.source?.name ?? undefined,
                publishedAt: article.publishedAt ?? undefined,
            }));
        if (articles.length === 0) {
            return failure(FailureReason.NotFound, 'no articles');
        }
        return success({ kind: 'headlines', totalResults: body.totalResults, articles });
    }
}
