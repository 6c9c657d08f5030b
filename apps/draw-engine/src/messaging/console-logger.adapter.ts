import { Inject, Injectable } from '@nestjs/common';
import { RawPoolConfig } from '@config/pool-config.schema';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { Logger } from '@shared/ports/Logger';

type Level = 'info' | 'warn' | 'error';

const WRITERS: Record<Level, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/** One JSON line per entry, tagged with the pool id. */
@Injectable()
export class ConsoleLogger implements Logger {
  private readonly pool: string;

  constructor(@Inject(VALIDATED_ENV) env: RawPoolConfig) {
    this.pool = env.POOL_ID;
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: Level, message: string, context?: Record<string, unknown>): void {
    const entry = {
      time: new Date().toISOString(),
      level,
      pool: this.pool,
      msg: message,
      ...context,
    };
    WRITERS[level](
      JSON.stringify(entry, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value,
      ),
    );
  }
}
