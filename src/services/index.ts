import type { Config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { JsonFileStateStore, ReadOnlyStateStore, CampaignStateStore } from './campaignStateStore.js';
import { ChatHistoryReplyOracle, ReplyOracle } from './replyOracle.js';
import { CampaignScheduler } from './campaignScheduler.js';
import { CampaignDispatcher, DispatchOptions } from './campaignDispatcher.js';
import { AppleScriptMessagingService } from './messaging/appleScript.js';
import { SimulatedMessagingService } from './messaging/simulated.js';
import type { MessagingService } from './messaging/types.js';

export interface RunOptions {
  simulate: boolean;
  only?: string;
  ratePerMinute?: number;
  statePath?: string;
  sleep?: DispatchOptions['sleep'];
  clock?: DispatchOptions['clock'];
}

export interface CampaignServices {
  store: CampaignStateStore;
  oracle: ReplyOracle;
  transport: MessagingService;
  scheduler: CampaignScheduler;
  dispatcher: CampaignDispatcher;
}

export function createStateStore(config: Config, options: RunOptions): CampaignStateStore {
  const fileStore = new JsonFileStateStore(options.statePath ?? config.campaign.statePath);
  if (options.simulate && !config.simulation.commitState) {
    logger.info('Simulated run with CAMPAIGN_SIMULATE_COMMIT_STATE=false; state file will not be updated');
    return new ReadOnlyStateStore(fileStore);
  }
  if (options.simulate) {
    logger.warn('Simulated run commits state: stages "sent" now will not be sent again for real');
  }
  return fileStore;
}

export function createTransport(config: Config, options: RunOptions): MessagingService {
  if (options.simulate) {
    return new SimulatedMessagingService();
  }
  return new AppleScriptMessagingService({
    scriptPath: config.messages.appleScriptPath,
    timeoutMs: config.messages.sendTimeoutMs,
  });
}

/**
 * Build every service a campaign run needs. Loads the state table once;
 * the scheduler keeps it in memory and saves it after each decision.
 */
export async function initializeCampaignServices(config: Config, options: RunOptions): Promise<CampaignServices> {
  const store = createStateStore(config, options);
  const states = await store.load();
  const oracle = new ChatHistoryReplyOracle(config.messages.chatDbPath);
  const transport = createTransport(config, options);

  const scheduler = new CampaignScheduler({ store, states, oracle, transport });
  const dispatcher = new CampaignDispatcher(scheduler, {
    ratePerMinute: options.ratePerMinute ?? config.campaign.ratePerMinute,
    only: options.only,
    sleep: options.sleep,
    clock: options.clock,
  });

  logger.info(
    { channel: transport.channel, trackedContacts: states.size, simulate: options.simulate },
    'Campaign services initialized'
  );

  return { store, oracle, transport, scheduler, dispatcher };
}
