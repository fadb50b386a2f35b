import type { PipelineStage } from '@core/errors';
import type { BuildMode, ModuleIdentity, SourceFile } from '@core/types/pipeline';

export interface BuildReport {
  route: string;
  mode: BuildMode;
  timestamp: string;
  duration: number;
  status: 'done' | 'failed';
  failedStage?: PipelineStage;
  sources: {
    primary: number;
    dependency: number;
    foreign: number;
  };
  modules: {
    total: number;
    compiled: ModuleIdentity[];
    reused: ModuleIdentity[];
    kept: ModuleIdentity[];
    dropped: ModuleIdentity[];
  };
  size: {
    bundle: number;
    output: number;
  };
  cacheHits: number;
  cacheMisses: number;
}

export class BuildAnalyzer {
  private startTime: number;
  private report: BuildReport;

  constructor(route: string, mode: BuildMode) {
    this.startTime = Date.now();
    this.report = this.createEmptyReport(route, mode);
  }

  private createEmptyReport(route: string, mode: BuildMode): BuildReport {
    return {
      route,
      mode,
      timestamp: new Date().toISOString(),
      duration: 0,
      status: 'done',
      sources: {
        primary: 0,
        dependency: 0,
        foreign: 0
      },
      modules: {
        total: 0,
        compiled: [],
        reused: [],
        kept: [],
        dropped: []
      },
      size: {
        bundle: 0,
        output: 0
      },
      cacheHits: 0,
      cacheMisses: 0
    };
  }

  recordSources(files: SourceFile[]) {
    for (const file of files) {
      this.report.sources[file.kind]++;
    }
  }

  recordMake(compiled: ModuleIdentity[], reused: ModuleIdentity[]) {
    this.report.modules.total = compiled.length + reused.length;
    this.report.modules.compiled = [...compiled];
    this.report.modules.reused = [...reused];
    this.report.cacheMisses += compiled.length;
    this.report.cacheHits += reused.length;
  }

  recordBundle(kept: ModuleIdentity[], dropped: ModuleIdentity[], bytes: number) {
    this.report.modules.kept = [...kept];
    this.report.modules.dropped = [...dropped];
    this.report.size.bundle = bytes;
  }

  recordFailure(stage: PipelineStage) {
    this.report.status = 'failed';
    this.report.failedStage = stage;
  }

  finalize(outputBytes: number): BuildReport {
    this.report.duration = Date.now() - this.startTime;
    this.report.size.output = outputBytes;
    return this.report;
  }

  getCacheEfficiency(): number {
    const total = this.report.cacheHits + this.report.cacheMisses;
    return total === 0 ? 0 : (this.report.cacheHits / total) * 100;
  }
}
