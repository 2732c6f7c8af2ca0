import { Body, Controller, Get, HttpException, HttpStatus, Post, Query } from '@nestjs/common';
import { SpeechService } from './speech.service';
import { SpeechResult } from './speech.types';
import { SpeechToTextDto, TextToSpeechDto } from './dto/speech.dto';

function unwrap<T>(result: SpeechResult<T>): T {
    if (result.ok) {
        return result.value;
    }
    const status = result.reason === 'no_speech' ? HttpStatus.UNPROCESSABLE_ENTITY : HttpStatus.BAD_GATEWAY;
    throw new HttpException({ reason: result.reason, message: result.error }, status);
}

@Controller('speech')
export class SpeechController {
    constructor(private readonly speechService: SpeechService) {}

    @Post('speech-to-text')
    async speechToText(@Body() body: SpeechToTextDto) {
        const audio = Buffer.from(body.audioData, 'base64');
        return unwrap(await this.speechService.transcribe(audio, {
            language: body.language,
            format: body.audioFormat,
        }));
    }

    @Post('text-to-speech')
    async textToSpeech(@Body() body: TextToSpeechDto) {
        return unwrap(await this.speechService.synthesize(body.text, {
            voice: body.voice,
            language: body.language,
            format: body.format,
        }));
    }

    @Get('voices')
    async voices(@Query('language') language?: string) {
        const voices = unwrap(await this.speechService.listVoices(language || undefined));
        return { voices };
    }

    @Get('languages')
    async languages() {
        const languages = unwrap(await this.speechService.listLanguages());
        return { languages };
    }
}
