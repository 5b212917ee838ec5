import { createModuleLogger } from '../../utils/logger.js';
import type { MessagingService, SendMessageResult } from './types.js';

const log = createModuleLogger('simulatedMessaging');

/**
 * Transport for simulated (dry) runs: logs what would be sent and always succeeds.
 */
export class SimulatedMessagingService implements MessagingService {
  readonly channel = 'simulated' as const;

  async sendTextMessage(to: string, text: string): Promise<SendMessageResult> {
    log.info({ to, text }, '[SIMULATED] would send message');
    return { channel: this.channel, timestamp: new Date() };
  }
}
