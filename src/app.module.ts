import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { validateEnv } from './config/env.validation';
import { ChatModule } from './logic/chat/chat.module';
import { SpeechModule } from './logic/speech/speech.module';
import { SocketGatewayModule } from './logic/socket-gateway/socket-gateway.module';
import { ToolsModule } from './logic/tools/tools.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    SpeechModule,
    ChatModule,
    SocketGatewayModule,
    ToolsModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
