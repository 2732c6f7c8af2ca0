import { Injectable, Logger } from '@nestjs/common';
import { normalizeUtterance, tokenize } from '../../utils/textNormalizer';
import { Classification, Entity, Intent, RoutableIntent } from '../../utils/types';
import {
    ALL_KEYWORDS,
    INTENT_VOCABULARY,
    KNOWN_TICKERS,
    STOCK_ALIASES,
    STOP_WORDS,
    TIME_WORDS,
    TRIGGER_TICKERS,
} from './vocabulary';

interface IntentRule {
    intent: RoutableIntent;
    matches(lower: string, tokens: string[]): boolean;
    extract(text: string): Classification;
}

export const MAX_FORECAST_DAYS = 5;

const TICKER_SHAPE = /^[a-z]{1,5}(\.[a-z]{1,2})?$/i;
const DAY_COUNT = /\b(\d+)\s*-?\s*days?\b/i;
const DAY_COUNT_WORD = /^\d+(?:-?days?)?$/;

const SINGLE_TIME_WORDS = new Set(TIME_WORDS.filter(word => !word.includes(' ')));

function bare(word: string): string {
    return tokenize(word.toLowerCase()).join(' ').replace(/'s$/, '');
}

function isFiller(key: string): boolean {
    return key.length === 0 || STOP_WORDS.has(key) || SINGLE_TIME_WORDS.has(key) || DAY_COUNT_WORD.test(key);
}

/** How many words at one end of `keys` are a time phrase, a day count or a stop-word. */
function fillerAtEdge(keys: string[], atEnd: boolean): number {
    for (const timeWord of TIME_WORDS) {
        const size = timeWord.split(' ').length;
        if (size > 1 && keys.length >= size) {
            const edge = atEnd ? keys.slice(keys.length - size) : keys.slice(0, size);
            if (edge.join(' ') === timeWord) return size;
        }
    }
    const key = atEnd ? keys[keys.length - 1] : keys[0];
    return key !== undefined && isFiller(key) ? 1 : 0;
}

function keywordMatch(intent: RoutableIntent) {
    const { keywords, phrases } = INTENT_VOCABULARY[intent];
    return (lower: string, tokens: string[]) =>
        tokens.some(token => keywords.has(token)) || phrases.some(pattern => pattern.test(lower));
}

/**
 * Rule-based classifier. Rules are tried in a fixed priority order
 * (weather, stock, news); the first one that matches decides the intent.
 * Pure: it keeps no state between calls and never throws.
 */
@Injectable()
export class IntentRouterService {
    private readonly logger = new Logger(IntentRouterService.name);

    private readonly rules: readonly IntentRule[] = [
        {
            intent: Intent.Weather,
            matches: keywordMatch(Intent.Weather),
            extract: text => this.extractWeather(text),
        },
        {
            intent: Intent.Stock,
            matches: (lower, tokens) =>
                keywordMatch(Intent.Stock)(lower, tokens) || tokens.some(token => TRIGGER_TICKERS.has(token)),
            extract: text => this.extractStock(text),
        },
        {
            intent: Intent.News,
            matches: keywordMatch(Intent.News),
            extract: text => this.extractNews(text),
        },
    ];

    classify(utterance: string): Classification {
        const text = normalizeUtterance(utterance);
        if (!text) {
            return { intent: Intent.Unknown };
        }
        const lower = text.toLowerCase();
        const tokens = tokenize(lower);

        const rule = this.rules.find(r => r.matches(lower, tokens));
        const classification: Classification = rule ? rule.extract(text) : { intent: Intent.Unknown };
        this.logger.debug(`"${text}" -> ${JSON.stringify(classification)}`);
        return classification;
    }

    private extractWeather(text: string): Classification {
        const dayCount = DAY_COUNT.exec(text);
        const wantsForecast = /\bforecasts?\b/i.test(text) || dayCount !== null;

        let location = this.cleanLocation(this.phraseAfter(text, ['in', 'for', 'at']) ?? '');
        if (!location) {
            location = this.cleanLocation(this.residue(text).join(' '));
        }

        if (!wantsForecast) {
            return { intent: Intent.Weather, ...this.entity(Intent.Weather, location) };
        }
        const requested = dayCount ? Number.parseInt(dayCount[1], 10) : MAX_FORECAST_DAYS;
        return {
            intent: Intent.Weather,
            ...this.entity(Intent.Weather, location),
            forecastDays: Math.min(Math.max(requested, 1), MAX_FORECAST_DAYS),
        };
    }

    private extractStock(text: string): Classification {
        const phrase = this.phraseAfter(text, ['of', 'for']);
        const ticker = (phrase && this.resolveTicker(phrase, this.withoutVocabulary(phrase.split(' '))))
            || this.resolveTicker(undefined, this.residue(text));
        return { intent: Intent.Stock, ...this.entity(Intent.Stock, ticker) };
    }

    private extractNews(text: string): Classification {
        const phrase = this.phraseAfter(text, ['about', 'on', 'regarding', 'from']);
        let topic: string | undefined;
        if (phrase && this.withoutVocabulary(phrase.split(' ')).length > 0) {
            topic = phrase.replace(/[\s,;:]+$/, '');
        } else {
            topic = this.residue(text).join(' ');
        }
        return { intent: Intent.News, ...this.entity(Intent.News, topic) };
    }

    private entity(intent: RoutableIntent, value: string | undefined): { entity?: Entity } {
        const trimmed = value?.trim();
        return trimmed ? { entity: { intent, value: trimmed } } : {};
    }

    /** Text after the first of the given prepositions, keeping the user's casing. */
    private phraseAfter(text: string, prepositions: string[]): string | undefined {
        const match = new RegExp(`\\b(?:${prepositions.join('|')})\\s+(.+)$`, 'i').exec(text);
        return match?.[1].trim() || undefined;
    }

    /** Words left once every intent keyword, stop-word, time word and bare number is removed. */
    private residue(text: string): string[] {
        return this.withoutVocabulary(text.split(' '));
    }

    private withoutVocabulary(words: string[]): string[] {
        return words.filter(word => {
            const key = bare(word);
            return key.length > 0
                && !ALL_KEYWORDS.has(key)
                && !STOP_WORDS.has(key)
                && !SINGLE_TIME_WORDS.has(key)
                && !/^\d+$/.test(key);
        });
    }

    /** Strips time phrases, day counts and stop-words from both ends of a location phrase. */
    private cleanLocation(phrase: string): string {
        const words = phrase.split(' ').filter(word => word && !ALL_KEYWORDS.has(bare(word)));
        const keys = words.map(bare);

        let start = 0;
        let end = words.length;
        while (start < end) {
            const leading = fillerAtEdge(keys.slice(start, end), false);
            const trailing = leading ? 0 : fillerAtEdge(keys.slice(start, end), true);
            if (!leading && !trailing) break;
            start += leading;
            end -= trailing;
        }
        return words.slice(start, end).join(' ').replace(/[\s,;:]+$/, '');
    }

    private resolveTicker(phrase: string | undefined, words: string[]): string | undefined {
        if (phrase) {
            const alias = STOCK_ALIASES.get(bare(phrase));
            if (alias) return alias;
        }

        const keys = words.map(bare);
        for (let size = keys.length; size > 0; size--) {
            for (let start = 0; start + size <= keys.length; start++) {
                const alias = STOCK_ALIASES.get(keys.slice(start, start + size).join(' '));
                if (alias) return alias;
            }
        }

        const known = keys.find(key => KNOWN_TICKERS.has(key));
        if (known) return known.toUpperCase();

        const [first] = keys;
        return first && TICKER_SHAPE.test(first) ? first.toUpperCase() : undefined;
    }
}
