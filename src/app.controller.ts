import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';

import { APP_VERSION, CLOCK } from './config/activity.config.js';
import type { Clock } from './config/activity.config.js';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  @Get('health')
  getHealth(): { status: 'ok'; version: string; timestamp: string } {
    return { status: 'ok', version: APP_VERSION, timestamp: this.clock().toISOString() };
  }
}
