import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseContacts, loadContacts } from '../contactSource.js';
import { ContactSourceError } from '../../errors/index.js';

const HEADER = 'phone,first_name,company,msg1,fup1_days,fup1_msg,fup2_days,fup2_msg';

describe('contactSource', () => {
  describe('parseContacts', () => {
    it('builds contacts with normalized phones and follow-ups', () => {
      const csv = [
        HEADER,
        '+1 (555) 123-4567,Ana,Acme,Hi {first_name},2,"Still interested, {first_name}?",5,Last try',
      ].join('\n');

      const { contacts, errors } = parseContacts(csv);

      expect(errors).toEqual([]);
      expect(contacts).toHaveLength(1);
      const [contact] = contacts;
      expect(contact.phone).toBe('+15551234567');
      expect(contact.matchKey).toBe('5551234567');
      expect(contact.initialMessage).toBe('Hi {first_name}');
      expect(contact.followUps).toEqual([
        { message: 'Still interested, {first_name}?', delayDays: 2 },
        { message: 'Last try', delayDays: 5 },
      ]);
      expect(contact.fields.first_name).toBe('Ana');
      expect(contact.fields.company).toBe('Acme');
      expect(contact.fields.phone).toBe('+15551234567');
      expect(contact.fields.phone_last10).toBe('5551234567');
    });

    it('defaults missing day fields to 0 and missing templates to empty', () => {
      const csv = ['phone,first_name,msg1', '5551234567,Ana,Hello'].join('\n');

      const { contacts } = parseContacts(csv);

      expect(contacts[0].followUps).toEqual([
        { message: '', delayDays: 0 },
        { message: '', delayDays: 0 },
      ]);
    });

    it('keeps rows without a phone so the dispatcher can report them', () => {
      const csv = [HEADER, ',Bo,Beta,Hello,,,,'].join('\n');

      const { contacts } = parseContacts(csv);

      expect(contacts).toHaveLength(1);
      expect(contacts[0].phone).toBe('');
      expect(contacts[0].matchKey).toBe('');
    });

    it('reports and skips rows with invalid day values', () => {
      const csv = [
        HEADER,
        '5551234567,Ana,Acme,Hello,soon,Follow up,,',
        '5559876543,Bo,Beta,Hello,1,Follow up,,',
      ].join('\n');

      const { contacts, errors } = parseContacts(csv);

      expect(contacts.map((c) => c.matchKey)).toEqual(['5559876543']);
      expect(errors).toEqual([{ line: 2, reason: 'fup1_days must be a whole number of days, got "soon"' }]);
    });

    it('reports file line numbers across blank lines', () => {
      const csv = [HEADER, '5559876543,Bo,Beta,Hello,1,Follow up,,', '', '5551234567,Ana,Acme,Hello,1.5,,,'].join(
        '\n'
      );

      const { errors } = parseContacts(csv);

      expect(errors).toEqual([{ line: 4, reason: 'fup1_days must be a whole number of days, got "1.5"' }]);
    });

    it('tolerates rows with missing trailing columns', () => {
      const csv = [HEADER, '5551234567,Ana,Acme,Hello'].join('\n');

      const { contacts, errors } = parseContacts(csv);

      expect(errors).toEqual([]);
      expect(contacts[0].initialMessage).toBe('Hello');
      expect(contacts[0].followUps[0]).toEqual({ message: '', delayDays: 0 });
    });

    it('throws ContactSourceError for structurally broken CSV', () => {
      const csv = [HEADER, '5551234567,"unterminated,Acme,Hello'].join('\n');

      expect(() => parseContacts(csv)).toThrow(ContactSourceError);
    });
  });

  describe('loadContacts', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'contacts-test-'));
    });

    afterEach(async () => {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    });

    it('reads contacts from a file', async () => {
      const filePath = path.join(tempDir, 'contacts.csv');
      await fs.promises.writeFile(filePath, [HEADER, '5551234567,Ana,Acme,Hello,,,,'].join('\n'), 'utf-8');

      const { contacts } = await loadContacts(filePath);

      expect(contacts).toHaveLength(1);
      expect(contacts[0].phone).toBe('5551234567');
    });

    it('throws ContactSourceError when the file is missing', async () => {
      await expect(loadContacts(path.join(tempDir, 'missing.csv'))).rejects.toThrow(ContactSourceError);
    });
  });
});
