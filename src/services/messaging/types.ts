/**
 * Messaging Service Interface
 *
 * Common interface for outbound delivery transports (Messages app, simulation)
 */

export type MessagingChannelType = 'imessage' | 'simulated';

export interface MessagingService {
  readonly channel: MessagingChannelType;

  /**
   * Send a text message to a recipient
   * @param to - Recipient phone number in display form
   * @param text - Message content
   * @throws MessageDeliveryError when the transport reports a failure
   */
  sendTextMessage(to: string, text: string): Promise<SendMessageResult>;
}

export interface SendMessageResult {
  channel: MessagingChannelType;
  timestamp: Date;
}
