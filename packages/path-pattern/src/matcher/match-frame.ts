/**
 * Choice point left behind by a `**` that is not the last segment. Backtracking resumes the walk at
 * `segmentIndex + 1` with the wildcard spanning `pathIndex` up to (excluding) `nextEnd`.
 */
export type MatchFrame = {
  segmentIndex: number;
  pathIndex: number;
  nextEnd: number;
  lastEnd: number;
  bindingBase: number;
  captureBase: number;
};
