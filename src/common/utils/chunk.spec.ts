import { chunk } from './chunk';

describe('chunk', () => {
  it('splits into ceil(n / size) contiguous batches', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no batches for an empty list', () => {
    expect(chunk([], 10)).toEqual([]);
  });

  it('returns a single batch when size exceeds the length', () => {
    expect(chunk(['a', 'b'], 120)).toEqual([['a', 'b']]);
  });

  it('rejects non-positive sizes', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
    expect(() => chunk([1], 1.5)).toThrow(RangeError);
  });
});
