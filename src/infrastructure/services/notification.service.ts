import { Logger } from '../../shared/logger';
import type { AlertEvent } from '../../domain/entities/alert.entity';
import type { INotificationService, INotifier } from '../../domain/interfaces/services.interface';

export class NotificationService implements INotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(private readonly notifiers: readonly INotifier[]) {}

  get notifierNames(): string[] {
    return this.notifiers.map((n) => n.name);
  }

  async dispatch(events: readonly AlertEvent[]): Promise<void> {
    if (!events.length) return;

    const results = await Promise.allSettled(this.notifiers.map((n) => n.send(events)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.error(`Notifier ${this.notifiers[i].name} failed`, result.reason);
      }
    });
    this.logger.info(`Dispatched ${events.length} alerts to ${this.notifiers.length} notifiers`);
  }
}
