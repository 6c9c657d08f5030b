import { Injectable, Inject } from '@nestjs/common';
import { Msg, NatsConnection, Subscription } from 'nats';
import { DomainError } from '@shared/kernel/DomainError';
import { Logger } from '@shared/ports/Logger';
import {
  CommandHandler,
  CommandSubscriber,
  PoolCommandName,
} from '@engine/application/ports/CommandSubscriber';
import { commandSchemas } from './schemas';
import { PoolTopics, commandSubject } from './topics';
import { NATS_CONNECTION, NATS_TOPICS, LOGGER } from './tokens';

export type CommandReply =
  | { ok: true; data: unknown }
  | { ok: false; error: string; message: string; issues?: { path: string; message: string }[] };

/**
 * Request/reply command surface. Payloads are validated against
 * {@link commandSchemas} before reaching a handler, and every request
 * gets exactly one reply.
 */
@Injectable()
export class NatsCommandSubscriber implements CommandSubscriber {
  private readonly subscriptions: Subscription[] = [];
  private readonly encoder = new TextEncoder();

  constructor(
    @Inject(NATS_CONNECTION) private readonly nats: NatsConnection,
    @Inject(NATS_TOPICS) private readonly topics: PoolTopics,
    @Inject(LOGGER) private readonly logger: Logger,
  ) {}

  handle<K extends PoolCommandName>(name: K, handler: CommandHandler<K>): void {
    const subject = commandSubject(this.topics, name);
    const schema = commandSchemas[name];
    const sub = this.nats.subscribe(subject, {
      callback: (err, msg) => {
        if (err) {
          this.logger.error('NATS subscription error', {
            subject,
            error: err.message,
          });
          return;
        }

        let raw: unknown;
        try {
          raw = msg.data.length === 0 ? {} : msg.json();
        } catch (parseErr) {
          this.reply(msg, subject, {
            ok: false,
            error: 'INVALID_JSON',
            message: parseErr instanceof Error ? parseErr.message : String(parseErr),
          });
          return;
        }

        const result = schema.safeParse(raw);
        if (!result.success) {
          const issues = result.error.issues.map((i) => ({
            path: i.path.join('.'),
            message: i.message,
          }));
          this.logger.warn('Invalid NATS command payload', { subject, issues });
          this.reply(msg, subject, {
            ok: false,
            error: 'VALIDATION_ERROR',
            message: 'Command payload failed validation',
            issues,
          });
          return;
        }

        this.reply(msg, subject, this.execute(subject, () => handler(result.data)));
      },
    });
    this.subscriptions.push(sub);
  }

  async close(): Promise<void> {
    await Promise.all(this.subscriptions.map((s) => s.drain()));
    this.subscriptions.length = 0;
  }

  private execute(subject: string, run: () => unknown): CommandReply {
    try {
      return { ok: true, data: run() };
    } catch (err) {
      if (err instanceof DomainError) {
        return { ok: false, error: err.name, message: err.message };
      }
      this.logger.error('Command handler failed', {
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
      return { ok: false, error: 'INTERNAL_ERROR', message: 'Command could not be processed' };
    }
  }

  private reply(msg: Msg, subject: string, reply: CommandReply): void {
    if (!msg.reply) {
      this.logger.warn('Command received without a reply subject', {
        subject,
        ok: reply.ok,
      });
      return;
    }
    try {
      msg.respond(this.encoder.encode(JSON.stringify(reply)));
    } catch (err) {
      this.logger.error('NATS reply failed', {
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
