import * as fs from 'fs';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { createModuleLogger } from '../utils/logger.js';
import { isReplyMatchable, sanitizePhoneForLog } from '../utils/phone.js';

const log = createModuleLogger('replyOracle');

/**
 * Answers whether a contact has replied since a given time.
 */
export interface ReplyOracle {
  hasReplySince(matchKey: string, since: Date): Promise<boolean>;
}

// Seconds between 1970-01-01 and 2001-01-01 (Apple's reference date)
export const APPLE_EPOCH_OFFSET_SECONDS = 978_307_200;

// Above this, a chat.db timestamp is in nanoseconds rather than seconds
const NANOSECOND_THRESHOLD = 1_000_000_000_000;

/**
 * Convert a Messages timestamp (seconds or nanoseconds since 2001-01-01 UTC)
 * to Unix seconds. Returns null for values that are not numeric.
 */
export function appleTimestampToUnixSeconds(value: unknown): number | null {
  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'bigint') {
    numeric = Number(value);
  } else if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    numeric = Number(value.trim());
  } else {
    return null;
  }
  if (!Number.isFinite(numeric)) {
    return null;
  }

  const seconds = numeric > NANOSECOND_THRESHOLD ? numeric / 1_000_000_000 : Math.trunc(numeric);
  return seconds + APPLE_EPOCH_OFFSET_SECONDS;
}

// Newest inbound message whose handle, with formatting and the tel: prefix
// removed, ends in the match key.
const LATEST_INBOUND_QUERY = `
  SELECT message.date AS date
  FROM message
  JOIN handle ON handle.ROWID = message.handle_id
  WHERE message.is_from_me = 0
    AND REPLACE(REPLACE(REPLACE(REPLACE(REPLACE(REPLACE(handle.id, '-', ''), ' ', ''), '(', ''), ')', ''), '.', ''), 'tel:', '') LIKE ?
  ORDER BY message.date DESC
  LIMIT 1
`;

interface LatestInboundRow {
  date: unknown;
}

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs().catch((error: unknown) => {
      sqlJs = null;
      throw error;
    });
  }
  return sqlJs;
}

/**
 * Reply oracle backed by the Messages chat history database.
 *
 * The database file is read into memory and queried there, so the live
 * file is never opened for writing or locked. Every failure (missing file,
 * no Full Disk Access, schema mismatch) is logged and answered with `false`,
 * so follow-ups keep going when reply detection is degraded.
 */
export class ChatHistoryReplyOracle implements ReplyOracle {
  private chatDbPath: string;

  constructor(chatDbPath: string) {
    this.chatDbPath = chatDbPath;
  }

  async hasReplySince(matchKey: string, since: Date): Promise<boolean> {
    if (!isReplyMatchable(matchKey)) {
      log.warn(
        { contact: sanitizePhoneForLog(matchKey) },
        'Match key is shorter than 10 digits; reply detection disabled for it'
      );
      return false;
    }

    const latest = await this.findLatestInbound(matchKey);
    if (latest === null) {
      return false;
    }

    const latestUnix = appleTimestampToUnixSeconds(latest.date);
    if (latestUnix === null) {
      log.warn({ contact: sanitizePhoneForLog(matchKey) }, 'Unreadable timestamp on latest inbound message');
      return false;
    }

    return latestUnix * 1000 >= since.getTime();
  }

  private async findLatestInbound(matchKey: string): Promise<LatestInboundRow | null> {
    let contents: Buffer;
    try {
      contents = await fs.promises.readFile(this.chatDbPath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        log.warn({ chatDbPath: this.chatDbPath }, 'Chat history database not found; assuming no reply');
      } else {
        log.warn(
          { error, chatDbPath: this.chatDbPath },
          'Chat history database is not readable (does this process have Full Disk Access?); assuming no reply'
        );
      }
      return null;
    }

    let db: Database | null = null;
    try {
      const SQL = await loadSqlJs();
      db = new SQL.Database(contents);
      const statement = db.prepare(LATEST_INBOUND_QUERY);
      try {
        statement.bind([`%${matchKey}`]);
        if (!statement.step()) {
          return null;
        }
        return { date: statement.getAsObject().date };
      } finally {
        statement.free();
      }
    } catch (error) {
      log.warn({ error, chatDbPath: this.chatDbPath }, 'Chat history query failed; assuming no reply');
      return null;
    } finally {
      db?.close();
    }
  }
}
