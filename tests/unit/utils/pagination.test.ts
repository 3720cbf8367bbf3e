import { clampPagination } from '../../../src/utils/pagination';

describe('clampPagination', () => {
  it('should default a missing limit to 50', () => {
    expect(clampPagination()).toEqual({ limit: 50, offset: 0 });
  });

  it.each([0, -3])('should default limit %p to 50', (limit) => {
    expect(clampPagination(limit, 0).limit).toBe(50);
  });

  it('should cap the limit at 100', () => {
    expect(clampPagination(500, 0).limit).toBe(100);
  });

  it('should keep limits inside the range', () => {
    expect(clampPagination(100, 0).limit).toBe(100);
    expect(clampPagination(1, 0).limit).toBe(1);
  });

  it('should clamp a negative offset to 0', () => {
    expect(clampPagination(10, -20)).toEqual({ limit: 10, offset: 0 });
  });

  it('should keep a positive offset', () => {
    expect(clampPagination(10, 30)).toEqual({ limit: 10, offset: 30 });
  });
});
