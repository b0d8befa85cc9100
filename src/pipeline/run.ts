#!/usr/bin/env node
import { Command } from 'commander';
import { ZodError } from 'zod';
import {
  augmentSchema,
  checkArchivesSchema,
  convertSchema,
  deepFashionSchema,
  indexImagesSchema,
  ingestPolyvoreSchema,
  loadConfig,
  runOptionsSchema,
  sopSchema,
  verifyLayoutSchema,
} from './config.js';
import { PipelineError } from './errors.js';
import { runPipeline, runStage } from './pipeline.js';
import { resolveUserPath } from './utils.js';

const program = new Command();

program
  .name('fashion-manifest-pipeline')
  .description('Normalize fashion datasets into JSONL manifests and detection bundles.');

program
  .command('check-archives')
  .description('Check that each DeepFashion2 zip decrypts and holds readable JSON')
  .argument('<srcDir>', 'Directory containing the zip bundles')
  .requiredOption('--password <secret>', 'Zip password')
  .action(async (srcDir: string, raw: unknown) => {
    const { password } = checkArchivesSchema.pick({ password: true }).parse(raw);
    await runStage({ stage: 'check-archives', srcDir: resolveUserPath(srcDir), password });
  });

program
  .command('verify-layout')
  .description('Count images and annotations in an extracted DeepFashion2 tree')
  .argument('<root>', 'DeepFashion2 root')
  .action(async (root: string) => {
    const options = verifyLayoutSchema.parse({ root: resolveUserPath(root) });
    await runStage({ stage: 'verify-layout', ...options });
  });

program
  .command('convert')
  .description('Convert one DeepFashion2 split into a detection bundle')
  .requiredOption('--df2-root <path>', 'DeepFashion2 root')
  .requiredOption('--out-dir <path>', 'Output directory')
  .requiredOption('--split <split>', 'train, validation or test')
  .option('--limit <count>', 'Cap on number of images (0 = no cap)', '0')
  .action(async (raw: unknown) => {
    const options = convertSchema.parse(raw);
    await runStage({
      stage: 'convert',
      ...options,
      df2Root: resolveUserPath(options.df2Root),
      outDir: resolveUserPath(options.outDir),
    });
  });

program
  .command('ingest-polyvore')
  .description('Write Polyvore outfit and fill-in-the-blank manifests')
  .requiredOption('--polyvore-dir <path>', 'Polyvore metadata directory')
  .requiredOption('--out-outfits <path>', 'Outfits JSONL')
  .requiredOption('--out-fitb <path>', 'FITB JSONL')
  .action(async (raw: unknown) => {
    const options = ingestPolyvoreSchema.parse(raw);
    await runStage({
      stage: 'ingest-polyvore',
      polyvoreDir: resolveUserPath(options.polyvoreDir),
      outOutfits: resolveUserPath(options.outOutfits),
      outFitb: resolveUserPath(options.outFitb),
    });
  });

program
  .command('index-polyvore-images')
  .description('Map Polyvore item uids to image files on disk')
  .requiredOption('--images-root <path>', 'Polyvore images root')
  .requiredOption('--out <path>', 'Index JSONL')
  .action(async (raw: unknown) => {
    const options = indexImagesSchema.parse(raw);
    await runStage({
      stage: 'index-polyvore-images',
      imagesRoot: resolveUserPath(options.imagesRoot),
      out: resolveUserPath(options.out),
    });
  });

program
  .command('augment-polyvore')
  .description('Join local image paths into a Polyvore outfits manifest')
  .requiredOption('--outfits-in <path>', 'Outfits JSONL')
  .requiredOption('--item-images <path>', 'Index JSONL')
  .requiredOption('--images-root <path>', 'Polyvore images root')
  .requiredOption('--outfits-out <path>', 'Augmented outfits JSONL')
  .action(async (raw: unknown) => {
    const options = augmentSchema.parse(raw);
    await runStage({
      stage: 'augment-polyvore',
      outfitsIn: resolveUserPath(options.outfitsIn),
      itemImages: resolveUserPath(options.itemImages),
      imagesRoot: resolveUserPath(options.imagesRoot),
      outfitsOut: resolveUserPath(options.outfitsOut),
    });
  });

program
  .command('ingest-deep-fashion')
  .description('Build the deep_fashion image manifest and its stats')
  .requiredOption('--dataset-root <path>', 'deep_fashion root')
  .requiredOption('--out-manifest <path>', 'Manifest JSONL')
  .option('--out-stats <path>', 'Stats JSON')
  .action(async (raw: unknown) => {
    const options = deepFashionSchema.parse(raw);
    await runStage({
      stage: 'ingest-deep-fashion',
      datasetRoot: resolveUserPath(options.datasetRoot),
      outManifest: resolveUserPath(options.outManifest),
      outStats: options.outStats ? resolveUserPath(options.outStats) : undefined,
    });
  });

program
  .command('ingest-sop')
  .description('Write SOP user/outfit interactions as JSONL')
  .requiredOption('--sop-dir <path>', 'Directory with user_outfit_*_*.csv files')
  .requiredOption('--out <path>', 'Interactions JSONL')
  .action(async (raw: unknown) => {
    const options = sopSchema.parse(raw);
    await runStage({
      stage: 'ingest-sop',
      sopDir: resolveUserPath(options.sopDir),
      out: resolveUserPath(options.out),
    });
  });

program
  .command('run')
  .description('Run the stages listed in a pipeline config')
  .option('-c, --config <path>', 'Path to pipeline config', 'pipeline.config.json')
  .option('-s, --stages <list>', 'Comma separated stage names')
  .action(async (raw: unknown) => {
    const { config: configPath, stages } = runOptionsSchema.parse(raw);
    const config = await loadConfig(configPath);
    await runPipeline(config, { stages });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ZodError) {
    console.error(`Invalid options: ${error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    process.exitCode = 2;
    return;
  }
  if (error instanceof PipelineError) {
    console.error(error.message);
    process.exitCode = error.exitCode;
    return;
  }
  console.error(error);
  process.exitCode = 1;
});
