export interface ProcessorConfig {
  readonly collapseSlashes: boolean;
  readonly ignoreTrailingSlash: boolean;
  readonly blockTraversal: boolean;
}

export class ProcessorContext {
  public path: string;
  public segments: string[] = [];
  public readonly config: ProcessorConfig;

  constructor(path: string, config: ProcessorConfig) {
    this.path = path;
    this.config = config;
  }
}

export type PipelineStep = (ctx: ProcessorContext) => void;

export interface NormalizedPath {
  /** `/`-joined segments, used as the match cache key. */
  readonly normalized: string;
  readonly segments: readonly string[];
}
