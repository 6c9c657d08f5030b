import { Module } from '@nestjs/common';
import { Clock } from '@shared/ports/Clock';
import { SystemClock } from './SystemClock';

export const CLOCK = 'Clock';

@Module({
  providers: [
    {
      provide: CLOCK,
      useFactory: (): Clock => new SystemClock(),
    },
  ],
  exports: [CLOCK],
})
export class ClockModule {}
