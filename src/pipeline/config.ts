import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

const pathField = z.string().min(1);

export const checkArchivesSchema = z.object({
  srcDir: pathField,
  password: z.string().min(1, 'password is required'),
});

export const verifyLayoutSchema = z.object({
  root: pathField,
});

export const convertSchema = z.object({
  df2Root: pathField,
  outDir: pathField,
  split: z.enum(['train', 'validation', 'test']),
  limit: z.coerce.number().int().min(0).default(0),
});

export const ingestPolyvoreSchema = z.object({
  polyvoreDir: pathField,
  outOutfits: pathField,
  outFitb: pathField,
});

export const indexImagesSchema = z.object({
  imagesRoot: pathField,
  out: pathField,
});

export const augmentSchema = z.object({
  outfitsIn: pathField,
  itemImages: pathField,
  imagesRoot: pathField,
  outfitsOut: pathField,
});

export const deepFashionSchema = z.object({
  datasetRoot: pathField,
  outManifest: pathField,
  outStats: z.string().optional(),
});

export const sopSchema = z.object({
  sopDir: pathField,
  out: pathField,
});

const stageSchema = z.discriminatedUnion('stage', [
  checkArchivesSchema.extend({ stage: z.literal('check-archives') }),
  verifyLayoutSchema.extend({ stage: z.literal('verify-layout') }),
  convertSchema.extend({ stage: z.literal('convert') }),
  ingestPolyvoreSchema.extend({ stage: z.literal('ingest-polyvore') }),
  indexImagesSchema.extend({ stage: z.literal('index-polyvore-images') }),
  augmentSchema.extend({ stage: z.literal('augment-polyvore') }),
  deepFashionSchema.extend({ stage: z.literal('ingest-deep-fashion') }),
  sopSchema.extend({ stage: z.literal('ingest-sop') }),
]);

export const STAGE_NAMES = [
  'check-archives',
  'verify-layout',
  'convert',
  'ingest-polyvore',
  'index-polyvore-images',
  'augment-polyvore',
  'ingest-deep-fashion',
  'ingest-sop',
] as const;

export const runOptionsSchema = z.object({
  config: pathField.default('pipeline.config.json'),
  stages: z
    .string()
    .optional()
    .transform((list) => list?.split(',').map((item) => item.trim()).filter(Boolean))
    .pipe(z.array(z.enum(STAGE_NAMES)).optional()),
});

const configSchema = z.object({
  stages: z.array(stageSchema).min(1),
});

export type StageConfig = z.infer<typeof stageSchema>;
export type StageName = StageConfig['stage'];
export type PipelineConfig = z.infer<typeof configSchema>;

export function parseConfig(candidate: unknown): PipelineConfig {
  return configSchema.parse(candidate);
}

export async function loadConfig(configPath: string): Promise<PipelineConfig> {
  const absolutePath = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);

  const data = await fs.readFile(absolutePath, 'utf-8');
  return parseConfig(JSON.parse(data));
}
