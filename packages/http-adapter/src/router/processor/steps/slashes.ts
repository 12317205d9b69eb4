import type { ProcessorContext } from '../context';

export function collapseSlashes(ctx: ProcessorContext): void {
  const last = ctx.segments.length - 1;

  ctx.segments = ctx.segments.filter((segment, index) => segment !== '' || index === last);
}

export function handleTrailingSlashOptions(ctx: ProcessorContext): void {
  if (ctx.config.ignoreTrailingSlash && ctx.segments.at(-1) === '') {
    ctx.segments.pop();
  }
}
