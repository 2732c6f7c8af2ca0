import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError } from '../../utils/providerRequest';
import { AudioOutputFormat, SynthesizedAudio } from '../../utils/types';
import {
    AudioInputFormat,
    RecognitionEncoding,
    SPEECH_RECOGNIZER,
    SPEECH_SYNTHESIZER,
    SpeechRecognizer,
    SpeechResult,
    SpeechSynthesizer,
    SynthesisEncoding,
    SynthesizeOptions,
    TranscribeOptions,
    Transcript,
    VoiceInfo,
} from './speech.types';

const RECOGNITION_ENCODINGS: Record<AudioInputFormat, RecognitionEncoding> = {
    webm_opus: 'WEBM_OPUS',
    webm: 'WEBM_OPUS',
    ogg: 'OGG_OPUS',
    wav: 'LINEAR16',
    flac: 'FLAC',
    unspecified: 'ENCODING_UNSPECIFIED',
};

const SYNTHESIS_ENCODINGS: Record<AudioOutputFormat, SynthesisEncoding> = {
    mp3: 'MP3',
    wav: 'LINEAR16',
    ogg: 'OGG_OPUS',
};

function toBuffer(content: string | Uint8Array): Buffer {
    return typeof content === 'string' ? Buffer.from(content, 'base64') : Buffer.from(content);
}

@Injectable()
export class SpeechService {
    private readonly logger = new Logger(SpeechService.name);
    private readonly defaultLanguage: string;
    private readonly defaultVoice: string;

    constructor(
        private readonly configService: ConfigService,
        @Inject(SPEECH_RECOGNIZER) private readonly recognizer: SpeechRecognizer,
        @Inject(SPEECH_SYNTHESIZER) private readonly synthesizer: SpeechSynthesizer,
    ) {
        this.defaultLanguage = this.configService.get<string>('SPEECH_LANGUAGE') || 'en-US';
        this.defaultVoice = this.configService.get<string>('SPEECH_VOICE') || 'en-US-Standard-A';
    }

    async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<SpeechResult<Transcript>> {
        const language = options.language || this.defaultLanguage;
        if (audio.length === 0) {
            return { ok: false, reason: 'no_speech', error: 'No audio received' };
        }

        try {
            const [response] = await this.recognizer.recognize({
                config: {
                    encoding: RECOGNITION_ENCODINGS[options.format ?? 'webm_opus'],
                    languageCode: language,
                    enableAutomaticPunctuation: true,
                    enableWordConfidence: true,
                },
                audio: { content: audio.toString('base64') },
            });

            const best = response.results?.[0]?.alternatives?.[0];
            const transcript = best?.transcript?.trim();
            if (!transcript) {
                return { ok: false, reason: 'no_speech', error: 'No speech detected or recognition failed' };
            }
            return {
                ok: true,
                value: { transcript, confidence: best?.confidence ?? undefined, language },
            };
        } catch (error) {
            this.logger.warn(`Speech recognition failed: ${describeError(error)}`);
            return { ok: false, reason: 'provider_error', error: `Speech recognition error: ${describeError(error)}` };
        }
    }

    async synthesize(text: string, options: SynthesizeOptions = {}): Promise<SpeechResult<SynthesizedAudio>> {
        const voice = options.voice || this.defaultVoice;
        const language = options.language || this.defaultLanguage;
        const format = options.format ?? 'mp3';

        try {
            const [response] = await this.synthesizer.synthesizeSpeech({
                input: { text },
                voice: { languageCode: language, name: voice },
                audioConfig: { audioEncoding: SYNTHESIS_ENCODINGS[format], speakingRate: 1.0, pitch: 0.0 },
            });
            if (!response.audioContent || response.audioContent.length === 0) {
                return { ok: false, reason: 'provider_error', error: 'Text-to-speech returned no audio' };
            }
            return {
                ok: true,
                value: { audioData: toBuffer(response.audioContent).toString('base64'), format, voice, language },
            };
        } catch (error) {
            this.logger.warn(`Speech synthesis failed: ${describeError(error)}`);
            return { ok: false, reason: 'provider_error', error: `Text-to-speech error: ${describeError(error)}` };
        }
    }

    async listVoices(language = this.defaultLanguage): Promise<SpeechResult<VoiceInfo[]>> {
        try {
            const [response] = await this.synthesizer.listVoices({ languageCode: language });
            const voices = (response.voices ?? []).map(voice => ({
                name: voice.name ?? '',
                languageCodes: voice.languageCodes ?? [],
                ssmlGender: String(voice.ssmlGender ?? 'SSML_VOICE_GENDER_UNSPECIFIED'),
                naturalSampleRateHertz: voice.naturalSampleRateHertz ?? 0,
            }));
            return { ok: true, value: voices };
        } catch (error) {
            this.logger.warn(`Listing voices failed: ${describeError(error)}`);
            return { ok: false, reason: 'provider_error', error: `Error getting voices: ${describeError(error)}` };
        }
    }

    async listLanguages(): Promise<SpeechResult<string[]>> {
        try {
            const [response] = await this.synthesizer.listVoices({});
            const languages = new Set((response.voices ?? []).flatMap(voice => voice.languageCodes ?? []));
            return { ok: true, value: [...languages].sort() };
        } catch (error) {
            this.logger.warn(`Listing languages failed: ${describeError(error)}`);
            return { ok: false, reason: 'provider_error', error: `Error getting languages: ${describeError(error)}` };
        }
    }
}
