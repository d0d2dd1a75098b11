import { Global, Module } from '@nestjs/common';
import {
  ACTIVITY_CONFIG,
  CLOCK,
  loadActivityConfig,
  systemClock,
} from './activity.config.js';

@Global()
@Module({
  providers: [
    { provide: ACTIVITY_CONFIG, useFactory: () => loadActivityConfig() },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [ACTIVITY_CONFIG, CLOCK],
})
export class ConfigModule {}
