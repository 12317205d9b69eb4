import type { ProcessorContext } from '../context';

export function resolveDotSegments(ctx: ProcessorContext): void {
  const resolved: string[] = [];
  let trailing = false;

  for (const segment of ctx.segments) {
    trailing = false;

    if (segment === '.') {
      trailing = true;
    } else if (segment === '..') {
      resolved.pop();
      trailing = true;
    } else {
      resolved.push(segment);
    }
  }

  // `/a/b/..` addresses the directory `/a/`
  if (trailing && resolved.length > 0) {
    resolved.push('');
  }

  ctx.segments = resolved;
}
