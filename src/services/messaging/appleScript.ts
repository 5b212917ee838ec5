import { spawn } from 'child_process';
import { MessageDeliveryError } from '../../errors/index.js';
import { createModuleLogger } from '../../utils/logger.js';
import { sanitizePhoneForLog } from '../../utils/phone.js';
import type { MessagingService, SendMessageResult } from './types.js';

const log = createModuleLogger('appleScriptMessaging');

const DEFAULT_TIMEOUT_MS = 30 * 1000;

// Keep at most this much stderr for error reports
const MAX_STDERR_BYTES = 64 * 1024;

export interface AppleScriptMessagingOptions {
  scriptPath: string;
  timeoutMs?: number;
  /** Interpreter binary, `osascript` unless overridden */
  command?: string;
}

/**
 * Sends texts through the Messages app by running
 * `osascript <script> <phone> <text>`.
 */
export class AppleScriptMessagingService implements MessagingService {
  readonly channel = 'imessage' as const;
  private scriptPath: string;
  private timeoutMs: number;
  private command: string;

  constructor(options: AppleScriptMessagingOptions) {
    this.scriptPath = options.scriptPath;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.command = options.command ?? 'osascript';
  }

  sendTextMessage(to: string, text: string): Promise<SendMessageResult> {
    const recipient = sanitizePhoneForLog(to);

    return new Promise((resolve, reject) => {
      const abortController = new AbortController();
      const timeoutId = setTimeout(() => {
        abortController.abort();
      }, this.timeoutMs);

      const child = spawn(this.command, [this.scriptPath, to, text], {
        signal: abortController.signal,
        stdio: ['ignore', 'ignore', 'pipe'],
      });

      let stderr = '';
      let stderrBytes = 0;
      let settled = false;

      const finish = (error: Error | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        if (error) {
          reject(error);
        } else {
          resolve({ channel: this.channel, timestamp: new Date() });
        }
      };

      child.stderr?.on('data', (data: Buffer) => {
        stderrBytes += data.length;
        if (stderrBytes > MAX_STDERR_BYTES) {
          return;
        }
        stderr += data.toString();
      });

      child.on('close', (code: number | null) => {
        if (code === 0) {
          log.debug({ to: recipient }, 'Message handed to Messages');
          finish(null);
          return;
        }
        const detail = stderr.trim() || `osascript exited with code ${code}`;
        log.error({ to: recipient, code, stderr: detail }, 'osascript failed');
        finish(new MessageDeliveryError(`Message delivery failed: ${detail}`));
      });

      child.on('error', (error: Error) => {
        if (error.name === 'AbortError') {
          log.error({ to: recipient, timeoutMs: this.timeoutMs }, 'osascript timed out');
          finish(new MessageDeliveryError(`Message delivery timed out after ${this.timeoutMs}ms`, { cause: error }));
          return;
        }
        log.error({ to: recipient, error }, 'Failed to spawn osascript');
        finish(new MessageDeliveryError(`Could not run ${this.command}: ${error.message}`, { cause: error }));
      });
    });
  }
}
