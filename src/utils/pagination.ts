import { config } from '../config';

export interface Page {
  limit: number;
  offset: number;
}

/**
 * Non-positive or missing limits fall back to the default, large ones are capped,
 * negative offsets become 0.
 */
export const clampPagination = (limit?: number, offset?: number): Page => {
  const { defaultLimit, maxLimit } = config.pagination;

  let safeLimit = limit === undefined || !Number.isFinite(limit) ? 0 : Math.trunc(limit);
  if (safeLimit <= 0) {
    safeLimit = defaultLimit;
  } else if (safeLimit > maxLimit) {
    safeLimit = maxLimit;
  }

  const safeOffset =
    offset === undefined || !Number.isFinite(offset) ? 0 : Math.max(0, Math.trunc(offset));

  return { limit: safeLimit, offset: safeOffset };
};
