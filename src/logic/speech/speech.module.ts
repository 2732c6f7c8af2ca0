import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SpeechClient } from '@google-cloud/speech';
import { TextToSpeechClient } from '@google-cloud/text-to-speech';
import { SpeechService } from './speech.service';
import { SpeechController } from './speech.controller';
import { SPEECH_RECOGNIZER, SPEECH_SYNTHESIZER, SpeechRecognizer, SpeechSynthesizer } from './speech.types';

function clientOptions(configService: ConfigService) {
    return {
        keyFilename: configService.get<string>('GOOGLE_APPLICATION_CREDENTIALS'),
        projectId: configService.get<string>('GOOGLE_CLOUD_PROJECT'),
    };
}

@Module({
    controllers: [SpeechController],
    providers: [
        SpeechService,
        {
            provide: SPEECH_RECOGNIZER,
            useFactory: (configService: ConfigService): SpeechRecognizer => new SpeechClient(clientOptions(configService)),
            inject: [ConfigService],
        },
        {
            provide: SPEECH_SYNTHESIZER,
            useFactory: (configService: ConfigService): SpeechSynthesizer => new TextToSpeechClient(clientOptions(configService)),
            inject: [ConfigService],
        },
    ],
    exports: [SpeechService],
})
export class SpeechModule {}
