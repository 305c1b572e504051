import { RingBuffer } from '../../utils/ring-buffer';

describe('RingBuffer', () => {
  it('should reject a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow('RingBuffer capacity must be a positive integer, got 0');
  });

  it('should evict the oldest item when full', () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach((n) => buffer.push(n));

    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.first()).toBe(3);
    expect(buffer.last()).toBe(5);
    expect(buffer.size()).toBe(3);
  });

  it('should prepend older items only while there is room', () => {
    const buffer = new RingBuffer<number>(3);
    buffer.push(10);

    expect(buffer.prepend(9)).toBe(true);
    expect(buffer.prepend(8)).toBe(true);
    expect(buffer.prepend(7)).toBe(false);
    expect(buffer.toArray()).toEqual([8, 9, 10]);
  });

  it('should hand out copies', () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.toArray().push(99);
    expect(buffer.size()).toBe(1);
  });

  it('should be empty before the first push', () => {
    const buffer = new RingBuffer<number>(2);
    expect(buffer.size()).toBe(0);
    expect(buffer.first()).toBeUndefined();
    expect(buffer.last()).toBeUndefined();
  });
});
