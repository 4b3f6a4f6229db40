import type { AlertEvent } from '../../domain/entities/alert.entity';
import type { INotifier } from '../../domain/interfaces/services.interface';
import { Logger } from '../../shared/logger';
import { formatPlain } from './alert-format';

export class ConsoleNotifier implements INotifier {
  readonly name = 'console';
  private readonly logger = new Logger(ConsoleNotifier.name);

  async send(events: readonly AlertEvent[]): Promise<void> {
    for (const event of events) {
      this.logger.info(formatPlain(event), {
        symbol: event.symbol,
        reason: event.reason,
        confluenceScore: +event.confluenceScore.toFixed(2),
        regime: event.regime,
      });
    }
  }
}
