import { PATH_SEPARATOR } from '../constants';

import { ProcessorContext } from './context';
import type { PipelineStep, ProcessedPath } from './context';
import { collapseSlashes, detectTrailingSlash, requireLeadingSlash } from './steps/slashes';
import { splitPath, trimPath } from './steps/split';

/**
 * Turns a request path into the component list the matcher walks.
 * A path without a leading separator is rejected; no decoding happens here.
 */
export class PathProcessor {
  private readonly pipeline: PipelineStep[] = [trimPath, requireLeadingSlash, detectTrailingSlash, splitPath, collapseSlashes];

  process(path: string): ProcessedPath | null {
    const ctx = new ProcessorContext(path);

    for (const step of this.pipeline) {
      step(ctx);
      if (ctx.rejected) {
        return null;
      }
    }

    return {
      normalized: PATH_SEPARATOR + ctx.segments.join(PATH_SEPARATOR),
      segments: ctx.segments,
      hadTrailingSlash: ctx.hadTrailingSlash,
    };
  }
}
