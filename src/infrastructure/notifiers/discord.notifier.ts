import type { AlertEvent } from '../../domain/entities/alert.entity';
import type { INotifier } from '../../domain/interfaces/services.interface';
import { formatPlain } from './alert-format';

// Discord rejects message content above 2000 characters.
const MAX_CONTENT = 2000;

export class DiscordNotifier implements INotifier {
  readonly name = 'discord';

  constructor(private readonly webhookUrl: string) {}

  async send(events: readonly AlertEvent[]): Promise<void> {
    for (const event of events) {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ content: formatPlain(event).slice(0, MAX_CONTENT) }),
      });
      if (!response.ok) {
        throw new Error(`Discord webhook responded with HTTP ${response.status}: ${response.statusText}`);
      }
    }
  }
}
