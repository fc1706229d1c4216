import { Logger as NestLogger } from '@nestjs/common';
import { EventHandler, Logger, isJsonObject } from '../../interfaces';

export type EventLogLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Logs every dispatched payment event
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Logger = new NestLogger(LoggingEventHandler.name),
    private readonly logLevel: EventLogLevel = 'normal',
  ) {}

  getHandler(): EventHandler {
    return (eventType: string, payload: unknown) => {
      this.logger.log(`[Payment Event] ${eventType} ${JSON.stringify(this.prepareLogData(payload))}`);
    };
  }

  private prepareLogData(payload: unknown): Record<string, unknown> {
    if (!isJsonObject(payload)) {
      return {};
    }

    switch (this.logLevel) {
      case 'verbose':
        return payload;

      case 'minimal':
        return { reference: payload.reference };

      case 'normal':
      default:
        return {
          provider: payload.provider,
          reference: payload.reference,
          status: payload.status,
          channel: payload.channel,
        };
    }
  }
}
