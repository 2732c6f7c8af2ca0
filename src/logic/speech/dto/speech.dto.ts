import { IsBase64, IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { AudioOutputFormat } from '../../../utils/types';
import { AUDIO_INPUT_FORMATS, AUDIO_OUTPUT_FORMATS, AudioInputFormat } from '../speech.types';

export class SpeechToTextDto {
    @IsBase64()
    @IsNotEmpty()
    audioData!: string;

    @IsOptional()
    @IsString()
    language?: string;

    @IsOptional()
    @IsIn(AUDIO_INPUT_FORMATS)
    audioFormat?: AudioInputFormat;
}

export class TextToSpeechDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(5000)
    text!: string;

    @IsOptional()
    @IsString()
    voice?: string;

    @IsOptional()
    @IsString()
    language?: string;

    @IsOptional()
    @IsIn(AUDIO_OUTPUT_FORMATS)
    format?: AudioOutputFormat;
}
