import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ContactSourceError } from '../errors/index.js';
import { createModuleLogger } from '../utils/logger.js';
import { toDisplayPhone, toMatchKey } from '../utils/phone.js';
import type { Contact, FollowUp } from '../types/campaign.js';

const log = createModuleLogger('contactSource');

/**
 * A source row that could not be turned into a contact. `line` is the
 * 1-based line of the file where the row ends (the header is line 1).
 */
export interface ContactRowError {
  line: number;
  reason: string;
}

export interface ContactLoadResult {
  contacts: Contact[];
  errors: ContactRowError[];
}

type RawRow = Record<string, string>;

const parsedRowsSchema = z.array(
  z.object({
    record: z.record(z.string()),
    info: z.object({ lines: z.number() }),
  })
);

function parseDelayDays(row: RawRow, column: string): number {
  const raw = (row[column] ?? '').trim();
  if (raw === '') {
    return 0;
  }
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${column} must be a whole number of days, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function followUpFrom(row: RawRow, messageColumn: string, daysColumn: string): FollowUp {
  return {
    message: (row[messageColumn] ?? '').trim(),
    delayDays: parseDelayDays(row, daysColumn),
  };
}

export function rowToContact(row: RawRow): Contact {
  const phone = toDisplayPhone(row.phone);
  const matchKey = toMatchKey(phone);

  const fields: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    fields[column] = value;
  }
  fields.phone = phone;
  fields.phone_last10 = matchKey;

  return {
    phone,
    matchKey,
    fields,
    initialMessage: (row.msg1 ?? '').trim(),
    followUps: [followUpFrom(row, 'fup1_msg', 'fup1_days'), followUpFrom(row, 'fup2_msg', 'fup2_days')],
  };
}

/**
 * Parse contact CSV text. Rows with invalid values are reported in `errors`
 * and left out; the rest are returned in source order.
 */
export function parseContacts(csvText: string): ContactLoadResult {
  let parsed: unknown;
  try {
    parsed = parse(csvText, {
      columns: true,
      bom: true,
      info: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new ContactSourceError(
      `Could not parse contact CSV: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const rows = parsedRowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new ContactSourceError('Contact CSV produced unexpected records');
  }

  const contacts: Contact[] = [];
  const errors: ContactRowError[] = [];

  for (const { record, info } of rows.data) {
    try {
      contacts.push(rowToContact(record));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn({ line: info.lines, reason }, 'Skipping invalid contact row');
      errors.push({ line: info.lines, reason });
    }
  }

  return { contacts, errors };
}

export async function loadContacts(filePath: string): Promise<ContactLoadResult> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ContactSourceError(`Could not read contacts file ${filePath}`, { cause: error });
  }

  const result = parseContacts(content);
  log.info({ filePath, contacts: result.contacts.length, invalidRows: result.errors.length }, 'Contacts loaded');
  return result;
}
