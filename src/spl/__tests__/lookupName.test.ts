import { describe, it, expect } from 'vitest';
import {
  BackupNamer,
  backupLookupName,
  formatBackupTimestamp,
  lookupExtension,
  validateLookupName,
} from '../lookupName';
import { InputError } from '../../errors';

describe('validateLookupName', () => {
  it.each(['test.csv', 'attacks_lookup.csv', 'geo-2026.v2.csv', 'archive.csv.gz'])('accepts %s', (name) => {
    expect(validateLookupName(name)).toBe(name);
  });

  it.each(['test', 'test.txt', 'my lookup.csv', '../etc.csv', 'a|b.csv', '.csv', 'x"y.csv'])('rejects %s', (name) => {
    expect(() => validateLookupName(name)).toThrow(InputError);
  });
});

describe('backup names', () => {
  it('formats timestamps as YYYYMMDDHHmmss in local time', () => {
    expect(formatBackupTimestamp(new Date(2026, 9, 18, 9, 5, 7))).toBe('20261018090507');
  });

  it('repeats the lookup extension after the timestamp', () => {
    expect(backupLookupName('test.csv', '20261018090507')).toBe('test.csv_20261018090507.csv');
    expect(backupLookupName('big.csv.gz', '20261018090507')).toBe('big.csv.gz_20261018090507.csv.gz');
  });

  it('finds the longest matching extension', () => {
    expect(lookupExtension('big.csv.gz')).toBe('.csv.gz');
    expect(lookupExtension('plain.csv')).toBe('.csv');
  });
});

describe('BackupNamer', () => {
  it('uses the clock reading for the first name', () => {
    const namer = new BackupNamer(() => new Date(2026, 9, 18, 9, 5, 7, 250));

    expect(namer.next('test.csv')).toEqual({
      backupName: 'test.csv_20261018090507.csv',
      timestamp: '20261018090507',
    });
  });

  it('never repeats a name within the same second', () => {
    const namer = new BackupNamer(() => new Date(2026, 9, 18, 9, 5, 7, 250));

    const first = namer.next('test.csv');
    const second = namer.next('test.csv');
    const third = namer.next('test.csv');

    expect(first.timestamp).toBe('20261018090507');
    expect(second.timestamp).toBe('20261018090508');
    expect(third.timestamp).toBe('20261018090509');
  });

  it('follows the clock again once it moves past the last name', () => {
    const readings = [new Date(2026, 9, 18, 9, 5, 7), new Date(2026, 9, 18, 9, 5, 7), new Date(2026, 9, 18, 10, 0, 0)];
    const namer = new BackupNamer(() => readings.shift() ?? new Date(2026, 9, 18, 11, 0, 0));

    expect(namer.next('a.csv').timestamp).toBe('20261018090507');
    expect(namer.next('a.csv').timestamp).toBe('20261018090508');
    expect(namer.next('a.csv').timestamp).toBe('20261018100000');
  });
});
