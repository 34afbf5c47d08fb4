export interface LoadResult {
  totalRecords: number;
  successCount: number;
  failedCount: number;
}

export function emptyLoadResult(): LoadResult {
  return { totalRecords: 0, successCount: 0, failedCount: 0 };
}

export function addLoadResults(a: LoadResult, b: LoadResult): LoadResult {
  return {
    totalRecords: a.totalRecords + b.totalRecords,
    successCount: a.successCount + b.successCount,
    failedCount: a.failedCount + b.failedCount,
  };
}

/** Result counted for a type whose whole load threw before producing one. */
export function failedLoadResult(): LoadResult {
  return { totalRecords: 0, successCount: 0, failedCount: 1 };
}
