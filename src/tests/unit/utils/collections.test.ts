import { chunkArray, groupBy } from '@/utils/collections';
import { toCalendarDate, toUnixSeconds } from '@/utils/dates';

describe('chunkArray', () => {
  it('should split into chunks of at most the given size', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('should return no chunks for an empty array', () => {
    expect(chunkArray([], 20)).toEqual([]);
  });
});

describe('groupBy', () => {
  it('should keep groups in order of first appearance', () => {
    const groups = groupBy(['b1', 'a1', 'b2', 'a2', 'c1'], (item) => item.charAt(0));

    expect([...groups.entries()]).toEqual([
      ['b', ['b1', 'b2']],
      ['a', ['a1', 'a2']],
      ['c', ['c1']],
    ]);
  });
});

describe('dates', () => {
  it('should truncate a timestamp to its UTC calendar date', () => {
    expect(toCalendarDate(Date.parse('2024-03-09T23:59:59Z'))).toBe('2024-03-09');
  });

  it('should convert to whole unix seconds', () => {
    expect(toUnixSeconds(new Date(1704067200999))).toBe(1704067200);
  });
});
