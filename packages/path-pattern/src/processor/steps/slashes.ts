import { PATH_SEPARATOR } from '../../constants';
import { hasTrailingSlash } from '../../utils/path-utils';
import type { ProcessorContext } from '../context';

export function requireLeadingSlash(ctx: ProcessorContext): void {
  if (!ctx.path.startsWith(PATH_SEPARATOR)) {
    ctx.reject();
  }
}

export function detectTrailingSlash(ctx: ProcessorContext): void {
  ctx.hadTrailingSlash = hasTrailingSlash(ctx.path);
}

export function collapseSlashes(ctx: ProcessorContext): void {
  const result: string[] = [];
  for (const segment of ctx.segments) {
    if (segment !== '') {
      result.push(segment);
    }
  }
  ctx.segments = result;
}
