import { Controller, Get } from '@nestjs/common';

export const SERVICE_NAME = 'voice-info-bot';

@Controller()
export class AppController {
  @Get('health')
  health() {
    return { status: 'healthy', service: SERVICE_NAME };
  }
}
