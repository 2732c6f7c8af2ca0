import { Module } from '@nestjs/common';
import { IntentRouterService } from './intent-router.service';

@Module({
    exports: [IntentRouterService],
    providers: [IntentRouterService],
})
export class IntentRouterModule {}
