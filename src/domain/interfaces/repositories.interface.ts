import type { AlertState } from '../entities/alert.entity';

export interface IAlertStateRepository {
  /** A missing or unreadable store yields a fresh empty state. */
  load(): AlertState;
  save(state: AlertState): void;
}
