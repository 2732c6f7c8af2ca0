import { Injectable, Logger } from '@nestjs/common';
import { IntentRouterService } from '../intent-router/intent-router.service';
import { ResponseComposerService, RenderOptions } from '../response-composer/response-composer.service';
import { ConversationSession } from '../conversation/conversation-session';
import { WeatherService } from '../weather/weather.service';
import { StockService } from '../stock/stock.service';
import { NewsService } from '../news/news.service';
import { SpeechService } from '../speech/speech.service';
import { SpeechFailureReason, TranscribeOptions, Transcript } from '../speech/speech.types';
import * as templates from '../response-composer/templates';
import { describeError } from '../../utils/providerRequest';
import {
    Classification,
    FailureReason,
    Intent,
    ServiceResult,
    Turn,
    Utterance,
    assertNever,
    createUtterance,
    entityOf,
    failure,
} from '../../utils/types';

export type VoiceOptions = TranscribeOptions & RenderOptions;

export type VoiceReply =
    | { ok: true; transcript: Transcript; turn: Turn }
    | { ok: false; reason: SpeechFailureReason; text: string };

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);

    constructor(
        private readonly intentRouter: IntentRouterService,
        private readonly composer: ResponseComposerService,
        private readonly weatherService: WeatherService,
        private readonly stockService: StockService,
        private readonly newsService: NewsService,
        private readonly speechService: SpeechService,
    ) {}

    /**
     * Classify, call at most one provider, compose the reply and record the
     * turn. Always yields a turn with text, whatever the input.
     */
    async handle(session: ConversationSession, utterance: Utterance | string, options: RenderOptions = {}): Promise<Turn> {
        const input = typeof utterance === 'string' ? createUtterance(utterance) : utterance;
        const classification = this.intentRouter.classify(input.text);
        const entity = entityOf(classification);

        const result = await this.dispatch(classification);
        const reply = await this.composer.render(classification, result, options);

        return session.record({
            utterance: input,
            intent: classification.intent,
            entity,
            result,
            text: reply.text,
            audio: reply.audio,
        });
    }

    async handleVoice(session: ConversationSession, audio: Buffer, options: VoiceOptions = {}): Promise<VoiceReply> {
        const heard = await this.speechService.transcribe(audio, { language: options.language, format: options.format });
        if (!heard.ok) {
            this.logger.warn(`Voice message on session ${session.id} not transcribed: ${heard.error}`);
            const text = heard.reason === 'no_speech' ? templates.voiceNotUnderstood() : templates.voiceUnavailable();
            return { ok: false, reason: heard.reason, text };
        }

        const utterance = createUtterance(heard.value.transcript, 'transcribed');
        const turn = await this.handle(session, utterance, {
            speak: options.speak,
            voice: options.voice,
            language: options.language,
        });
        return { ok: true, transcript: heard.value, turn };
    }

    private async dispatch(classification: Classification): Promise<ServiceResult | undefined> {
        switch (classification.intent) {
            case Intent.Unknown:
                return undefined;
            case Intent.Weather: {
                const city = classification.entity?.value;
                const days = classification.forecastDays;
                if (!city) return undefined;
                return this.call(Intent.Weather, () =>
                    days ? this.weatherService.fetchForecast(city, days) : this.weatherService.fetch(city));
            }
            case Intent.Stock: {
                const symbol = classification.entity?.value;
                if (!symbol) return undefined;
                return this.call(Intent.Stock, () => this.stockService.fetch(symbol));
            }
            case Intent.News: {
                const topic = classification.entity?.value;
                return this.call(Intent.News, () => this.newsService.fetch(topic));
            }
            default:
                return assertNever(classification);
        }
    }

    private async call(intent: Intent, lookup: () => Promise<ServiceResult>): Promise<ServiceResult> {
        this.logger.log(`Dispatching ${intent} lookup`);
        try {
            const result = await lookup();
            if (!result.ok) {
                this.logger.warn(`${intent} lookup failed: ${result.reason}${result.detail ? ` (${result.detail})` : ''}`);
            }
            return result;
        } catch (error) {
            this.logger.error(`${intent} lookup threw: ${describeError(error)}`);
            return failure(FailureReason.Unreachable, describeError(error));
        }
    }
}
