import { PATH_SEPARATOR } from '../../constants';
import type { ProcessorContext } from '../context';

export function trimPath(ctx: ProcessorContext): void {
  ctx.path = ctx.path.trim();
}

export function splitPath(ctx: ProcessorContext): void {
  ctx.segments = ctx.path.slice(1).split(PATH_SEPARATOR);
}
