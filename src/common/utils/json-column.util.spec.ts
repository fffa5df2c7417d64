import { parseJsonRecord, parseJsonStringList } from './json-column.util';

describe('json column parsing', () => {
  it('reads a document map and coerces non-boolean values to false', () => {
    expect(parseJsonRecord('{"photo":true,"marksheet":"yes"}')).toEqual({ photo: true, marksheet: false });
  });

  it('treats empty, malformed or mistyped content as an empty map', () => {
    expect(parseJsonRecord(null)).toEqual({});
    expect(parseJsonRecord('')).toEqual({});
    expect(parseJsonRecord('{not json')).toEqual({});
    expect(parseJsonRecord('["photo"]')).toEqual({});
  });

  it('keeps only string entries of a list', () => {
    expect(parseJsonStringList('["photo", 3, "marksheet"]')).toEqual(['photo', 'marksheet']);
  });

  it('treats malformed or non-array content as an empty list', () => {
    expect(parseJsonStringList(undefined)).toEqual([]);
    expect(parseJsonStringList('oops')).toEqual([]);
    expect(parseJsonStringList('{"a":1}')).toEqual([]);
  });
});
