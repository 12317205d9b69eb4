import { ProcessorContext } from './context';
import type { NormalizedPath, PipelineStep, ProcessorConfig } from './context';
import { resolveDotSegments } from './steps/dot-segments';
import { collapseSlashes, handleTrailingSlashOptions } from './steps/slashes';
import { removeLeadingSlash, splitPath } from './steps/split';
import { stripQuery } from './steps/strip-query';

/**
 * Turns a raw request path into the segments the matcher compares, through a pipeline
 * assembled once from the router options.
 */
export class Processor {
  private readonly config: ProcessorConfig;
  private readonly pipeline: PipelineStep[];

  constructor(config: ProcessorConfig) {
    this.config = config;
    this.pipeline = [stripQuery, removeLeadingSlash, splitPath];

    if (config.blockTraversal) {
      this.pipeline.push(resolveDotSegments);
    }

    if (config.collapseSlashes) {
      this.pipeline.push(collapseSlashes);
    }

    this.pipeline.push(handleTrailingSlashOptions);
  }

  normalize(path: string): NormalizedPath {
    const ctx = new ProcessorContext(path, this.config);

    for (const step of this.pipeline) {
      step(ctx);
    }

    return {
      normalized: '/' + ctx.segments.join('/'),
      segments: ctx.segments,
    };
  }
}
