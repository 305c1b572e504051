import { clamp, linearSlope, mean, percentChange, roundTo, standardDeviation } from '../../utils/math.utils';

describe('math.utils', () => {
  it('should clamp into range', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(clamp(0.4, 0, 1)).toBe(0.4);
  });

  it('should return 0 for the mean and stdev of nothing', () => {
    expect(mean([])).toBe(0);
    expect(standardDeviation([])).toBe(0);
  });

  it('should use the population standard deviation', () => {
    expect(mean([2, 4, 4, 4, 5, 5, 7, 9])).toBe(5);
    expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('should fit a least-squares slope', () => {
    expect(linearSlope([1, 3, 5, 7])).toBe(2);
    expect(linearSlope([5])).toBe(0);
  });

  it('should round to decimals', () => {
    expect(roundTo(1.23456, 2)).toBe(1.23);
    expect(roundTo(2.5, 0)).toBe(3);
  });

  it('should compute percent change and guard non-positive bases', () => {
    expect(percentChange(100, 110)).toBe(10);
    expect(percentChange(0, 110)).toBe(0);
  });
});
