import { describe, expect, it, vi } from 'vitest';
import type { AlertEvent } from '../../../domain/entities/alert.entity';
import type { INotifier } from '../../../domain/interfaces/services.interface';
import { NotificationService } from '../notification.service';

const event: AlertEvent = {
  symbol: 'BTCUSDT',
  createdAt: new Date('2024-05-01T12:00:00Z'),
  reason: 'VOLUME_SPIKE',
  message: 'CS: 70.0',
  confluenceScore: 70,
  regime: 'sideways',
};

function notifier(name: string, send: INotifier['send']) {
  return { name, send: vi.fn(send) };
}

describe('NotificationService', () => {
  it('keeps delivering when one notifier fails', async () => {
    const broken = notifier('broken', async () => {
      throw new Error('offline');
    });
    const working = notifier('working', async () => undefined);
    const service = new NotificationService([broken, working]);

    await expect(service.dispatch([event])).resolves.toBeUndefined();
    expect(broken.send).toHaveBeenCalledWith([event]);
    expect(working.send).toHaveBeenCalledWith([event]);
  });

  it('skips the fan-out when there is nothing to send', async () => {
    const working = notifier('working', async () => undefined);
    await new NotificationService([working]).dispatch([]);
    expect(working.send).not.toHaveBeenCalled();
  });

  it('lists its notifiers', () => {
    expect(new NotificationService([notifier('console', async () => undefined)]).notifierNames).toEqual(['console']);
  });
});
