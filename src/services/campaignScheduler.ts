import { createModuleLogger } from '../utils/logger.js';
import { formatMessage } from '../utils/template.js';
import { isReplyMatchable, sanitizePhoneForLog } from '../utils/phone.js';
import { createInitialState } from '../types/campaign.js';
import type { CampaignStage, CampaignState, CampaignStateTable, Contact } from '../types/campaign.js';
import type { CampaignStateStore } from './campaignStateStore.js';
import type { ReplyOracle } from './replyOracle.js';
import type { MessagingService } from './messaging/types.js';

const log = createModuleLogger('campaignScheduler');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Outcome of evaluating the stage transitions for one contact.
 */
export type CampaignDecision =
  | { kind: 'idle' }
  | { kind: 'send'; text: string; nextState: CampaignState };

export type ContactOutcomeStatus =
  /** Already halted by an earlier reply; nothing evaluated */
  | 'halted'
  /** Reply detected this run; contact is now halted */
  | 'replied'
  /** Nothing due */
  | 'idle'
  | 'sent'
  /** Delivery failed; state left as it was so the stage is retried next run */
  | 'failed';

export interface ContactOutcome {
  status: ContactOutcomeStatus;
  matchKey: string;
  stage: CampaignStage;
  message?: string;
}

function addDays(from: Date, days: number): Date {
  return new Date(from.getTime() + days * MS_PER_DAY);
}

function isDue(nextDue: Date | null, now: Date): boolean {
  return nextDue !== null && nextDue.getTime() <= now.getTime();
}

/**
 * Pure stage-transition step. First matching rule wins:
 *
 * - stage 0 with an initial template: send it, start the campaign
 * - stage 1 with a first follow-up due: send it
 * - stage 2 with a second follow-up due: send it, campaign complete
 *
 * `next_due` is only set when the following template exists.
 */
export function decideNextStep(contact: Contact, state: CampaignState, now: Date): CampaignDecision {
  const [firstFollowUp, secondFollowUp] = contact.followUps;

  if (state.stage === 0 && contact.initialMessage) {
    return {
      kind: 'send',
      text: formatMessage(contact.initialMessage, contact.fields),
      nextState: {
        ...state,
        started_at: now,
        stage: 1,
        next_due: firstFollowUp.message ? addDays(now, firstFollowUp.delayDays) : null,
      },
    };
  }

  if (state.stage === 1 && firstFollowUp.message && isDue(state.next_due, now)) {
    return {
      kind: 'send',
      text: formatMessage(firstFollowUp.message, contact.fields),
      nextState: {
        ...state,
        stage: 2,
        next_due: secondFollowUp.message ? addDays(now, secondFollowUp.delayDays) : null,
      },
    };
  }

  if (state.stage === 2 && secondFollowUp.message && isDue(state.next_due, now)) {
    return {
      kind: 'send',
      text: formatMessage(secondFollowUp.message, contact.fields),
      nextState: {
        ...state,
        stage: 3,
        next_due: null,
      },
    };
  }

  return { kind: 'idle' };
}

export interface CampaignSchedulerDeps {
  store: CampaignStateStore;
  states: CampaignStateTable;
  oracle: ReplyOracle;
  transport: MessagingService;
}

/**
 * CampaignScheduler runs the per-contact campaign state machine.
 *
 * For each contact it:
 * 1. Skips contacts already halted by a reply
 * 2. Halts (and persists) contacts that replied since the campaign started
 * 3. Sends the next due message, committing the new state only after delivery succeeds
 *
 * The state table is persisted after every decision. Persistence errors
 * propagate; delivery errors never do.
 */
export class CampaignScheduler {
  private store: CampaignStateStore;
  private states: CampaignStateTable;
  private oracle: ReplyOracle;
  private transport: MessagingService;

  constructor(deps: CampaignSchedulerDeps) {
    this.store = deps.store;
    this.states = deps.states;
    this.oracle = deps.oracle;
    this.transport = deps.transport;
  }

  /**
   * Current state for a key, or the zero state if none is recorded.
   */
  getState(matchKey: string): CampaignState {
    return this.states.get(matchKey) ?? createInitialState();
  }

  async processContact(contact: Contact, now: Date): Promise<ContactOutcome> {
    const key = contact.matchKey;
    const state = this.getState(key);
    const contactLog = log.child({ contact: sanitizePhoneForLog(contact.phone) });

    if (state.halted) {
      return { status: 'halted', matchKey: key, stage: state.stage };
    }

    if (state.started_at && isReplyMatchable(key) && (await this.oracle.hasReplySince(key, state.started_at))) {
      await this.commit(key, { ...state, halted: true });
      contactLog.info({ stage: state.stage }, 'Reply detected; halting follow-ups');
      return { status: 'replied', matchKey: key, stage: state.stage };
    }

    const decision = decideNextStep(contact, state, now);

    if (decision.kind === 'idle') {
      await this.commit(key, state);
      return { status: 'idle', matchKey: key, stage: state.stage };
    }

    try {
      await this.transport.sendTextMessage(contact.phone, decision.text);
    } catch (error) {
      contactLog.error({ error, stage: state.stage }, 'Delivery failed; stage will be retried next run');
      return { status: 'failed', matchKey: key, stage: state.stage, message: decision.text };
    }

    await this.commit(key, decision.nextState);
    contactLog.info(
      { stage: decision.nextState.stage, nextDue: decision.nextState.next_due?.toISOString() ?? null },
      'Message sent'
    );
    return { status: 'sent', matchKey: key, stage: decision.nextState.stage, message: decision.text };
  }

  private async commit(key: string, state: CampaignState): Promise<void> {
    this.states.set(key, state);
    await this.store.save(this.states);
  }
}
