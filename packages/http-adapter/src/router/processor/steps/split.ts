import type { ProcessorContext } from '../context';

export function removeLeadingSlash(ctx: ProcessorContext): void {
  if (ctx.path.startsWith('/')) {
    ctx.path = ctx.path.slice(1);
  }
}

export function splitPath(ctx: ProcessorContext): void {
  ctx.segments = ctx.path === '' ? [] : ctx.path.split('/');
}
