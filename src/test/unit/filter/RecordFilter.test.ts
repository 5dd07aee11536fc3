import { describe, expect, it } from 'vitest';
import { makeWhitelistFilter } from '../../../lib/Filter/RecordFilter.js';
import { makeRecord, type RecordFields } from '../../../lib/Record/Record.js';

const record = (fields: RecordFields) =>
  makeRecord(fields, { naturalKey: 'id', hashFields: [] }, new Date(0));

describe('makeWhitelistFilter', () => {
  const filter = makeWhitelistFilter({
    allow: { authority: ['North District', 'Harbour Board'] },
    deny: { stage: ['Construction'] },
    denyPrefixes: { usage_code: ['2'] },
  });

  it('should accept a record that passes every rule', () => {
    expect(
      filter.accepts(record({ id: '1', authority: ' North District ', stage: 'Design', usage_code: '1110' }))
    ).toBe(true);
  });

  it('should reject an authority outside the whitelist', () => {
    expect(filter.accepts(record({ id: '2', authority: 'East District' }))).toBe(false);
  });

  it('should reject a denied stage', () => {
    expect(filter.accepts(record({ id: '3', authority: 'Harbour Board', stage: 'Construction' }))).toBe(
      false
    );
  });

  it('should reject a denied usage code prefix', () => {
    expect(filter.accepts(record({ id: '4', authority: 'Harbour Board', usage_code: '2112' }))).toBe(
      false
    );
  });

  it('should accept everything without rules', () => {
    expect(makeWhitelistFilter({}).accepts(record({ id: '5' }))).toBe(true);
  });
});
