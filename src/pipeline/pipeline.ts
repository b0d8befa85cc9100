import { checkArchiveDirectory, formatReportLine } from '../archive/check.js';
import { convertDeepFashion2 } from '../detection/convert.js';
import { verifyLayout } from '../detection/verify.js';
import { buildDeepFashionManifest } from '../manifest/buildManifest.js';
import { augmentOutfits } from '../polyvore/augment.js';
import { indexPolyvoreImages } from '../polyvore/indexImages.js';
import { ingestPolyvore } from '../polyvore/ingest.js';
import { ingestSop } from '../sop/ingest.js';
import { createLogger } from '../utils/logger.js';
import type { PipelineConfig, StageConfig, StageName } from './config.js';
import { PipelineError } from './errors.js';

const logger = createLogger('pipeline');

export interface PipelineRunOptions {
  stages?: StageName[];
}

export interface StageOutcome {
  stage: StageName;
  result: unknown;
}

function filterStages(config: PipelineConfig, options: PipelineRunOptions): StageConfig[] {
  if (!options.stages || options.stages.length === 0) {
    return config.stages;
  }
  const wanted = new Set(options.stages);
  return config.stages.filter((stage) => wanted.has(stage.stage));
}

export async function runStage(stage: StageConfig): Promise<unknown> {
  switch (stage.stage) {
    case 'check-archives': {
      const report = await checkArchiveDirectory(stage.srcDir, stage.password);
      for (const line of report.lines) console.log(formatReportLine(line));
      if (report.failed) {
        throw new PipelineError('One or more archives failed to decrypt/read', 3);
      }
      return report;
    }
    case 'verify-layout': {
      const report = await verifyLayout(stage.root);
      if (report.exitCode !== 0) {
        throw new PipelineError(`Layout check failed for ${stage.root}`, report.exitCode);
      }
      return report;
    }
    case 'convert':
      return convertDeepFashion2(stage);
    case 'ingest-polyvore':
      return ingestPolyvore(stage);
    case 'index-polyvore-images':
      return indexPolyvoreImages(stage);
    case 'augment-polyvore':
      return augmentOutfits(stage);
    case 'ingest-deep-fashion':
      return buildDeepFashionManifest(stage);
    case 'ingest-sop':
      return ingestSop(stage);
  }
}

/** Runs the configured stages in order; the first failing stage stops the run. */
export async function runPipeline(config: PipelineConfig, options: PipelineRunOptions = {}): Promise<StageOutcome[]> {
  const outcomes: StageOutcome[] = [];
  for (const stage of filterStages(config, options)) {
    logger.log(`Running stage ${stage.stage}`);
    const result = await runStage(stage);
    outcomes.push({ stage: stage.stage, result });
  }
  logger.log(`Completed ${outcomes.length} stages`);
  return outcomes;
}
