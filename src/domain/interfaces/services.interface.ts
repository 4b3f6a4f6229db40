import type { AlertEvent } from '../entities/alert.entity';

export interface INotifier {
  readonly name: string;
  send(events: readonly AlertEvent[]): Promise<void>;
}

export interface INotificationService {
  /** Fans out to every notifier; a failing notifier never affects the others. */
  dispatch(events: readonly AlertEvent[]): Promise<void>;
}
