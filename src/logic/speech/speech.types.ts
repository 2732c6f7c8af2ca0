import { protos as speechProtos } from '@google-cloud/speech';
import { protos as ttsProtos } from '@google-cloud/text-to-speech';
import { AudioOutputFormat } from '../../utils/types';

export const SPEECH_RECOGNIZER = 'SPEECH_RECOGNIZER';
export const SPEECH_SYNTHESIZER = 'SPEECH_SYNTHESIZER';

type RecognizeRequest = speechProtos.google.cloud.speech.v1.IRecognizeRequest;
type RecognizeResponse = speechProtos.google.cloud.speech.v1.IRecognizeResponse;
type SynthesizeRequest = ttsProtos.google.cloud.texttospeech.v1.ISynthesizeSpeechRequest;
type SynthesizeResponse = ttsProtos.google.cloud.texttospeech.v1.ISynthesizeSpeechResponse;
type ListVoicesRequest = ttsProtos.google.cloud.texttospeech.v1.IListVoicesRequest;
type ListVoicesResponse = ttsProtos.google.cloud.texttospeech.v1.IListVoicesResponse;

export type RecognitionEncoding = keyof typeof speechProtos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding;
export type SynthesisEncoding = keyof typeof ttsProtos.google.cloud.texttospeech.v1.AudioEncoding;

/** The slice of SpeechClient the adapter calls. */
export interface SpeechRecognizer {
    recognize(request: RecognizeRequest): Promise<[RecognizeResponse, ...unknown[]]>;
}

/** The slice of TextToSpeechClient the adapter calls. */
export interface SpeechSynthesizer {
    synthesizeSpeech(request: SynthesizeRequest): Promise<[SynthesizeResponse, ...unknown[]]>;
    listVoices(request: ListVoicesRequest): Promise<[ListVoicesResponse, ...unknown[]]>;
}

export const AUDIO_INPUT_FORMATS = ['webm_opus', 'webm', 'ogg', 'wav', 'flac', 'unspecified'] as const;
export const AUDIO_OUTPUT_FORMATS: readonly AudioOutputFormat[] = ['mp3', 'wav', 'ogg'];

export type AudioInputFormat = (typeof AUDIO_INPUT_FORMATS)[number];

export type SpeechFailureReason = 'no_speech' | 'provider_error';

export type SpeechResult<T> =
    | { ok: true; value: T }
    | { ok: false; reason: SpeechFailureReason; error: string };

export interface Transcript {
    transcript: string;
    confidence?: number;
    language: string;
}

export interface TranscribeOptions {
    language?: string;
    format?: AudioInputFormat;
}

export interface SynthesizeOptions {
    voice?: string;
    language?: string;
    format?: AudioOutputFormat;
}

export interface VoiceInfo {
    name: string;
    languageCodes: string[];
    ssmlGender: string;
    naturalSampleRateHertz: number;
}
