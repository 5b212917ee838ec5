/**
 * Campaign domain types shared by the scheduler, the state store and the
 * contact source.
 */

export type CampaignStage = 0 | 1 | 2 | 3;

export interface FollowUp {
  message: string;
  delayDays: number;
}

export interface Contact {
  /** Display form, e.g. "+15551234567"; empty when the row had no phone */
  phone: string;
  /** Last 10 digits of the phone, '' when fewer exist */
  matchKey: string;
  /** Every source column by name, used as template placeholders */
  fields: Readonly<Record<string, string>>;
  initialMessage: string;
  followUps: readonly [FollowUp, FollowUp];
}

export interface CampaignState {
  started_at: Date | null;
  stage: CampaignStage;
  next_due: Date | null;
  halted: boolean;
}

export type CampaignStateTable = Map<string, CampaignState>;

export function createInitialState(): CampaignState {
  return {
    started_at: null,
    stage: 0,
    next_due: null,
    halted: false,
  };
}

/**
 * A contact that can never produce an action: no phone, or no initial message.
 */
export function isInertContact(contact: Contact): boolean {
  return contact.phone === '' || contact.initialMessage === '';
}
