import { Module } from '@nestjs/common';
import { SpeechModule } from '../speech/speech.module';
import { ResponseComposerService } from './response-composer.service';

@Module({
    imports: [SpeechModule],
    exports: [ResponseComposerService],
    providers: [ResponseComposerService],
})
export class ResponseComposerModule {}
