/**
 * Table and Date Utility Tests
 */

import { compositeKey, distinctBy, groupBy, mode, sumBy } from '../src/utils/tableOps';
import { calendarDaysBetween, toCalendarDate } from '../src/utils/dates';

describe('tableOps', () => {
  it('groups rows in first-seen key order', () => {
    const groups = groupBy(['b1', 'a1', 'b2'], v => v[0]);

    expect(Array.from(groups.entries())).toEqual([['b', ['b1', 'b2']], ['a', ['a1']]]);
  });

  it('keeps the first row per key', () => {
    expect(distinctBy([{ id: 'I1', t: 'A' }, { id: 'I1', t: 'B' }, { id: 'I2', t: 'C' }], r => r.id))
      .toEqual([{ id: 'I1', t: 'A' }, { id: 'I2', t: 'C' }]);
  });

  it('breaks mode ties by first appearance', () => {
    expect(mode(['2018-06-05', '2018-06-04', '2018-06-04', '2018-06-05'])).toBe('2018-06-05');
    expect(mode(['2018-06-05', '2018-06-04', '2018-06-04'])).toBe('2018-06-04');
    expect(mode([])).toBeUndefined();
  });

  it('is idempotent when re-applied to resolved dates', () => {
    const resolved = mode(['2018-06-04', '2018-06-05', '2018-06-05']);

    expect(mode([resolved, resolved, resolved])).toBe(resolved);
  });

  it('treats undefined and null alike in composite keys', () => {
    expect(compositeKey(['S1', undefined])).toBe(compositeKey(['S1', null]));
    expect(compositeKey(['a,b', 'c'])).not.toBe(compositeKey(['a', 'b,c']));
  });

  it('sums a column', () => {
    expect(sumBy([{ n: 2 }, { n: 5 }], r => r.n)).toBe(7);
  });
});

describe('dates', () => {
  it('reduces datetimes to calendar dates', () => {
    expect(toCalendarDate('2018-06-04')).toBe('2018-06-04');
    expect(toCalendarDate(' 2018-06-04T23:59:00-05:00 ')).toBe('2018-06-04');
    expect(toCalendarDate('2018-06-04 08:00')).toBe('2018-06-04');
  });

  it('rejects values that are not real dates', () => {
    expect(toCalendarDate('2018-13-01')).toBeNull();
    expect(toCalendarDate('06/04/2018')).toBeNull();
    expect(toCalendarDate('')).toBeNull();
    expect(toCalendarDate(undefined)).toBeNull();
  });

  it('counts whole calendar days', () => {
    expect(calendarDaysBetween('2018-06-01', '2018-06-04')).toBe(3);
    expect(calendarDaysBetween('2018-02-27', '2018-03-01')).toBe(2);
    expect(calendarDaysBetween('2018-06-04', '2018-06-01')).toBe(-3);
  });
});
