export interface ProcessedPath {
  /** `/`-joined components, always with a leading separator. */
  normalized: string;
  segments: string[];
  hadTrailingSlash: boolean;
}

export class ProcessorContext {
  public path: string;
  public segments: string[] = [];
  public hadTrailingSlash = false;
  public rejected = false;

  constructor(path: string) {
    this.path = path;
  }

  reject(): void {
    this.rejected = true;
  }
}

export type PipelineStep = (ctx: ProcessorContext) => void;
