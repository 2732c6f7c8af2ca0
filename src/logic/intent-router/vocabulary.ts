import vocabulary from './data/vocabulary.json';
import stockAliases from './data/stock-aliases.json';
import { escapeRegExp } from '../../utils/textNormalizer';
import { RoutableIntent } from '../../utils/types';

export interface IntentVocabulary {
    keywords: ReadonlySet<string>;
    phrases: readonly RegExp[];
}

// Tickers short enough to collide with ordinary words ("f", "v", "ma") only
// resolve inside a stock question; they never trigger one.
const MIN_TRIGGER_TICKER_LENGTH = 3;

function phrasePattern(phrase: string): RegExp {
    return new RegExp(`\\b${escapeRegExp(phrase)}\\b`);
}

function buildIntent(entry: { keywords: string[]; phrases: string[] }): IntentVocabulary {
    return {
        keywords: new Set(entry.keywords),
        phrases: entry.phrases.map(phrasePattern),
    };
}

export const INTENT_VOCABULARY: Record<RoutableIntent, IntentVocabulary> = {
    weather: buildIntent(vocabulary.intents.weather),
    stock: buildIntent(vocabulary.intents.stock),
    news: buildIntent(vocabulary.intents.news),
};

export const ALL_KEYWORDS: ReadonlySet<string> = new Set(
    Object.values(INTENT_VOCABULARY).flatMap(v => [...v.keywords]),
);

export const STOP_WORDS: ReadonlySet<string> = new Set(vocabulary.stopWords);

// Longest first so "this week" is cut before "week" could be.
export const TIME_WORDS: readonly string[] = [...vocabulary.timeWords].sort((a, b) => b.length - a.length);

const aliasEntries: [string, string][] = Object.entries(stockAliases);

export const STOCK_ALIASES: ReadonlyMap<string, string> = new Map(aliasEntries);

export const KNOWN_TICKERS: ReadonlySet<string> = new Set(aliasEntries.map(([, ticker]) => ticker.toLowerCase()));

export const TRIGGER_TICKERS: ReadonlySet<string> = new Set(
    [...KNOWN_TICKERS].filter(ticker => ticker.length >= MIN_TRIGGER_TICKER_LENGTH),
);
