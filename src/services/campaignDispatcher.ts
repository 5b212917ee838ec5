import { setTimeout as delay } from 'timers/promises';
import { createModuleLogger } from '../utils/logger.js';
import { isReplyMatchable, sanitizePhoneForLog, toMatchKey } from '../utils/phone.js';
import { isInertContact } from '../types/campaign.js';
import type { Contact } from '../types/campaign.js';
import type { CampaignScheduler, ContactOutcome } from './campaignScheduler.js';

const log = createModuleLogger('campaignDispatcher');

export interface DispatchOptions {
  ratePerMinute: number;
  /** Only process the contact whose phone has this match key */
  only?: string;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface DispatchSummary {
  sent: number;
  failed: number;
  /** Contacts halted by a reply detected during this run */
  replied: number;
  /** Contacts skipped because an earlier run halted them */
  halted: number;
  idle: number;
  /** Inert rows (no phone or no initial message) and rows excluded by `only` */
  skipped: number;
  outcomes: ContactOutcome[];
}

/**
 * Milliseconds to wait after each successful send. Rates below 1 are treated as 1.
 */
export function sendIntervalMs(ratePerMinute: number): number {
  return 60_000 / Math.max(ratePerMinute, 1);
}

/**
 * Walks the contact list in order, hands each eligible contact to the
 * scheduler, and throttles after every successful send.
 */
export class CampaignDispatcher {
  private scheduler: CampaignScheduler;
  private intervalMs: number;
  private onlyKey: string | null;
  private sleep: (ms: number) => Promise<void>;
  private clock: () => Date;

  constructor(scheduler: CampaignScheduler, options: DispatchOptions) {
    this.scheduler = scheduler;
    this.intervalMs = sendIntervalMs(options.ratePerMinute);
    this.onlyKey = options.only !== undefined ? toMatchKey(options.only) : null;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
    this.clock = options.clock ?? (() => new Date());
  }

  async run(contacts: readonly Contact[]): Promise<DispatchSummary> {
    const now = this.clock();
    const summary: DispatchSummary = {
      sent: 0,
      failed: 0,
      replied: 0,
      halted: 0,
      idle: 0,
      skipped: 0,
      outcomes: [],
    };

    for (const contact of contacts) {
      if (!contact.phone) {
        log.info({ fields: contact.fields }, 'Skipping row with missing phone');
        summary.skipped++;
        continue;
      }
      if (isInertContact(contact)) {
        log.debug({ contact: sanitizePhoneForLog(contact.phone) }, 'Skipping contact with no initial message');
        summary.skipped++;
        continue;
      }
      if (this.onlyKey !== null && contact.matchKey !== this.onlyKey) {
        summary.skipped++;
        continue;
      }
      if (!isReplyMatchable(contact.matchKey)) {
        log.warn(
          { contact: sanitizePhoneForLog(contact.phone) },
          'Phone has fewer than 10 digits: replies from this contact are not detected'
        );
      }

      const outcome = await this.scheduler.processContact(contact, now);
      summary.outcomes.push(outcome);

      switch (outcome.status) {
        case 'sent':
          summary.sent++;
          await this.sleep(this.intervalMs);
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'replied':
          summary.replied++;
          break;
        case 'halted':
          summary.halted++;
          break;
        case 'idle':
          summary.idle++;
          break;
      }
    }

    log.info(
      {
        sent: summary.sent,
        failed: summary.failed,
        replied: summary.replied,
        halted: summary.halted,
        idle: summary.idle,
        skipped: summary.skipped,
      },
      'Campaign run complete'
    );
    return summary;
  }
}
