import { formatAverage, parseGradeInput } from './grade-input';

describe('parseGradeInput', () => {
  it.each([
    ['80', 80],
    [' 92.5 ', 92.5],
    ['.5', 0.5],
    ['1e2', 100],
    ['-1', -1],
  ])('should parse %p', (raw, expected) => {
    expect(parseGradeInput(raw)).toBe(expected);
  });

  it.each(['abc', '12abc', '0x10', 'Infinity', '', '1,5'])('should reject %p', (raw) => {
    expect(parseGradeInput(raw)).toBeNull();
  });
});

describe('formatAverage', () => {
  it('should show N/A without grades', () => {
    expect(formatAverage(null)).toBe('N/A');
  });

  it('should show two decimals', () => {
    expect(formatAverage(85)).toBe('85.00');
    expect(formatAverage(99.67)).toBe('99.67');
  });
});
