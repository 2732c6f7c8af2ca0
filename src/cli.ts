#!/usr/bin/env node
import 'reflect-metadata';
import { createInterface } from 'readline';
import { Logger, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { validateEnv } from './config/env.validation';
import { ChatModule } from './logic/chat/chat.module';
import { ChatService } from './logic/chat/chat.service';
import { ConversationService } from './logic/conversation/conversation.service';

const FAREWELLS = new Set(['quit', 'exit', 'bye']);

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    ChatModule,
  ],
})
class CliModule {}

function isFarewell(line: string): boolean {
  return FAREWELLS.has(line.trim().toLowerCase());
}

async function main() {
  const app = await NestFactory.createApplicationContext(CliModule, { logger: ['error', 'warn'] });
  const chatService = app.get(ChatService);
  const session = app.get(ConversationService).open();

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log('Ask me about the weather, stocks or the news. Type "quit" to leave.');
  rl.setPrompt('> ');
  rl.prompt();
  try {
    for await (const line of rl) {
      if (isFarewell(line)) {
        console.log('Goodbye!');
        break;
      }
      const turn = await chatService.handle(session, line);
      console.log(turn.text);
      rl.prompt();
    }
  } finally {
    rl.close();
    await app.close();
  }
}

main().catch(error => {
  new Logger('Cli').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
