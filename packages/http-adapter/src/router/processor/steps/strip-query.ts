import type { ProcessorContext } from '../context';

export function stripQuery(ctx: ProcessorContext): void {
  const end = ctx.path.search(/[?#]/);

  if (end !== -1) {
    ctx.path = ctx.path.slice(0, end);
  }
}
