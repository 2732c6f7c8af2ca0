import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SpeechService } from './speech.service';
import { SPEECH_RECOGNIZER, SPEECH_SYNTHESIZER } from './speech.types';

describe('SpeechService', () => {
  let service: SpeechService;
  const recognizer = { recognize: jest.fn() };
  const synthesizer = { synthesizeSpeech: jest.fn(), listVoices: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SpeechService,
        { provide: ConfigService, useValue: new ConfigService({ SPEECH_LANGUAGE: 'en-GB', SPEECH_VOICE: 'en-GB-Standard-B' }) },
        { provide: SPEECH_RECOGNIZER, useValue: recognizer },
        { provide: SPEECH_SYNTHESIZER, useValue: synthesizer },
      ],
    }).compile();

    service = module.get<SpeechService>(SpeechService);
  });

  describe('transcribe', () => {
    it('sends the audio with the mapped encoding and returns the best alternative', async () => {
      recognizer.recognize.mockResolvedValue([
        { results: [{ alternatives: [{ transcript: ' weather in Leeds ', confidence: 0.93 }] }] },
      ]);

      const result = await service.transcribe(Buffer.from('abc'), { format: 'wav' });

      expect(recognizer.recognize).toHaveBeenCalledWith({
        config: {
          encoding: 'LINEAR16',
          languageCode: 'en-GB',
          enableAutomaticPunctuation: true,
          enableWordConfidence: true,
        },
        audio: { content: 'YWJj' },
      });
      expect(result).toEqual({
        ok: true,
        value: { transcript: 'weather in Leeds', confidence: 0.93, language: 'en-GB' },
      });
    });

    it('defaults to webm opus', async () => {
      recognizer.recognize.mockResolvedValue([{ results: [] }]);

      await service.transcribe(Buffer.from('abc'));

      expect(recognizer.recognize.mock.calls[0][0].config.encoding).toBe('WEBM_OPUS');
    });

    it('reports no_speech for empty audio without calling the recognizer', async () => {
      expect(await service.transcribe(Buffer.alloc(0))).toEqual({ ok: false, reason: 'no_speech', error: 'No audio received' });
      expect(recognizer.recognize).not.toHaveBeenCalled();
    });

    it('reports no_speech when nothing is recognized', async () => {
      recognizer.recognize.mockResolvedValue([{ results: [] }]);

      expect(await service.transcribe(Buffer.from('abc'))).toEqual({
        ok: false,
        reason: 'no_speech',
        error: 'No speech detected or recognition failed',
      });
    });

    it('reports provider_error when the recognizer throws', async () => {
      recognizer.recognize.mockRejectedValue(new Error('PERMISSION_DENIED'));

      expect(await service.transcribe(Buffer.from('abc'))).toEqual({
        ok: false,
        reason: 'provider_error',
        error: 'Speech recognition error: PERMISSION_DENIED',
      });
    });
  });

  describe('synthesize', () => {
    it('returns base64 audio in the requested format', async () => {
      synthesizer.synthesizeSpeech.mockResolvedValue([{ audioContent: Buffer.from('mp3-bytes') }]);

      const result = await service.synthesize('Hello there', { format: 'ogg' });

      expect(synthesizer.synthesizeSpeech).toHaveBeenCalledWith({
        input: { text: 'Hello there' },
        voice: { languageCode: 'en-GB', name: 'en-GB-Standard-B' },
        audioConfig: { audioEncoding: 'OGG_OPUS', speakingRate: 1.0, pitch: 0.0 },
      });
      expect(result).toEqual({
        ok: true,
        value: {
          audioData: Buffer.from('mp3-bytes').toString('base64'),
          format: 'ogg',
          voice: 'en-GB-Standard-B',
          language: 'en-GB',
        },
      });
    });

    it('reports provider_error for empty audio', async () => {
      synthesizer.synthesizeSpeech.mockResolvedValue([{ audioContent: Buffer.alloc(0) }]);

      expect(await service.synthesize('Hello')).toEqual({
        ok: false,
        reason: 'provider_error',
        error: 'Text-to-speech returned no audio',
      });
    });
  });

  describe('voice catalogue', () => {
    it('lists voices for a language', async () => {
      synthesizer.listVoices.mockResolvedValue([{
        voices: [{ name: 'en-US-Standard-A', languageCodes: ['en-US'], ssmlGender: 'MALE', naturalSampleRateHertz: 24000 }],
      }]);

      expect(await service.listVoices('en-US')).toEqual({
        ok: true,
        value: [{ name: 'en-US-Standard-A', languageCodes: ['en-US'], ssmlGender: 'MALE', naturalSampleRateHertz: 24000 }],
      });
      expect(synthesizer.listVoices).toHaveBeenCalledWith({ languageCode: 'en-US' });
    });

    it('lists unique language codes in order', async () => {
      synthesizer.listVoices.mockResolvedValue([{
        voices: [
          { name: 'a', languageCodes: ['fr-FR'] },
          { name: 'b', languageCodes: ['en-US', 'en-GB'] },
          { name: 'c', languageCodes: ['en-US'] },
        ],
      }]);

      expect(await service.listLanguages()).toEqual({ ok: true, value: ['en-GB', 'en-US', 'fr-FR'] });
    });
  });
});
