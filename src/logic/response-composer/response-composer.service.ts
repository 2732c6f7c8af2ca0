import { Injectable, Logger } from '@nestjs/common';
import { SpeechService } from '../speech/speech.service';
import { round1 } from '../../utils/numbers';
import {
    Classification,
    FailureReason,
    Headline,
    Intent,
    RoutableIntent,
    ServiceFailure,
    ServicePayload,
    ServiceResult,
    StockQuote,
    SynthesizedAudio,
    assertNever,
    entityOf,
} from '../../utils/types';
import * as templates from './templates';

export interface RenderOptions {
    speak?: boolean;
    voice?: string;
    language?: string;
}

export interface RenderedReply {
    text: string;
    audio?: SynthesizedAudio;
}

const SERVICE_NAMES: Record<RoutableIntent, string> = {
    [Intent.Weather]: 'weather',
    [Intent.Stock]: 'stock',
    [Intent.News]: 'news',
};

function headlineItem(article: Headline, index: number): string {
    const title = article.title.trim().replace(/[.\s]+$/, '');
    return article.source ? `${index + 1}. ${title} (${article.source}).` : `${index + 1}. ${title}.`;
}

function movement(quote: StockQuote): string {
    const change = Number(quote.change.toFixed(2));
    if (change === 0) {
        return 'unchanged';
    }
    return `${change > 0 ? 'up' : 'down'} $${Math.abs(change).toFixed(2)} (${quote.changePercent})`;
}

/**
 * Turns a classification and the provider outcome into the reply sentence.
 * Pure apart from `render`, which may also ask the speech adapter for audio.
 */
@Injectable()
export class ResponseComposerService {
    private readonly logger = new Logger(ResponseComposerService.name);

    constructor(private readonly speechService: SpeechService) {}

    compose(intent: Intent, entity?: string, result?: ServiceResult): string {
        switch (intent) {
            case Intent.Unknown:
                return templates.supportedTopics();
            case Intent.Weather:
            case Intent.Stock:
            case Intent.News:
                if (!result) return this.clarify(intent, entity);
                if (!result.ok) return this.composeFailure(intent, entity, result);
                return this.composeSuccess(result.payload, entity);
            default:
                return assertNever(intent);
        }
    }

    async render(classification: Classification, result?: ServiceResult, options: RenderOptions = {}): Promise<RenderedReply> {
        const text = this.compose(classification.intent, entityOf(classification)?.value, result);
        if (!options.speak) {
            return { text };
        }

        const speech = await this.speechService.synthesize(text, { voice: options.voice, language: options.language });
        if (!speech.ok) {
            this.logger.warn(`Replying with text only, synthesis failed: ${speech.error}`);
            return { text };
        }
        return { text, audio: speech.value };
    }

    private clarify(intent: RoutableIntent, entity?: string): string {
        switch (intent) {
            case Intent.Weather:
                return templates.askForCity();
            case Intent.Stock:
                return templates.askForSymbol();
            case Intent.News:
                return entity ? templates.notFound(entity) : templates.noHeadlines();
            default:
                return assertNever(intent);
        }
    }

    private composeFailure(intent: RoutableIntent, entity: string | undefined, result: ServiceFailure): string {
        const service = SERVICE_NAMES[intent];
        switch (result.reason) {
            case FailureReason.NotFound:
                if (entity) return templates.notFound(entity);
                return intent === Intent.News ? templates.noHeadlines() : this.clarify(intent);
            case FailureReason.RateLimited:
                return templates.rateLimited(service);
            case FailureReason.Unreachable:
                return templates.unreachable(service);
            case FailureReason.InvalidKey:
                return templates.invalidKey(service);
            default:
                return assertNever(result.reason);
        }
    }

    private composeSuccess(payload: ServicePayload, entity?: string): string {
        switch (payload.kind) {
            case 'weather':
                return templates.weatherReading(entity ?? payload.city, payload.description, round1(payload.temperature.current));
            case 'forecast':
                return templates.weatherForecast(
                    entity ?? payload.city,
                    payload.entries.map((day, i) => templates.forecastDay(i + 1, day.description, round1(day.temperature))),
                );
            case 'quote':
                return templates.stockMovement(payload.symbol, payload.price.toFixed(2), movement(payload));
            case 'headlines':
                if (payload.articles.length === 0) {
                    return entity ? templates.notFound(entity) : templates.noHeadlines();
                }
                return templates.headlineList(payload.articles.map(headlineItem), entity);
            default:
                return assertNever(payload);
        }
    }
}
