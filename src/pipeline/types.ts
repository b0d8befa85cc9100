export type JsonObject = Record<string, unknown>;

export interface ArchiveEntryInfo {
  name: string;
  directory: boolean;
  encrypted: boolean;
}

export type ArchiveStatus = 'OK' | 'FAIL' | 'SKIP';

export interface ArchiveCheckResult {
  ok: boolean;
  message: string;
}

export interface ArchiveReportLine {
  name: string;
  status: ArchiveStatus;
  reason: string;
}

export type Df2Split = 'train' | 'validation' | 'test';

export type BoundingBox = [number, number, number, number];

export interface ItemAnnotation {
  bounding_box: BoundingBox;
  category_id: number;
  category_name?: string;
}

export interface CanonicalImage {
  id: number;
  file_name: string;
  width: number;
  height: number;
}

export interface CanonicalAnnotation {
  id: number;
  image_id: number;
  category_id: number;
  bbox: BoundingBox;
  area: number;
  iscrowd: 0;
  segmentation: [];
}

export interface CanonicalCategory {
  id: number;
  name: string;
  supercategory: string;
}

export interface DetectionBundle {
  info: { description: string };
  licenses: [];
  images: CanonicalImage[];
  annotations: CanonicalAnnotation[];
  categories: CanonicalCategory[];
}

export interface ImageSize {
  width: number;
  height: number;
}

export type ImageSizeReader = (imagePath: string) => Promise<ImageSize>;

export interface ImageIndexEntry {
  item_uid: string;
  set_id: string;
  index: string;
  image_relpath: string;
  exists: true;
}

export interface OutfitItemRef {
  item_uid?: string;
  local_image_relpath?: string;
  local_image_abspath?: string;
  extra: JsonObject;
}

export interface OutfitRecord {
  source?: string;
  split?: string;
  outfit_uid?: string;
  set_id?: string;
  items: OutfitItemRef[];
  set_url?: string | null;
  date?: string | null;
  desc?: string | null;
  extra: JsonObject;
}

export interface FitbQuestion {
  source: 'polyvore';
  question_id: unknown;
  blank_position: unknown;
  answers: unknown[];
  correct_answer: unknown;
}

export interface InteractionRecord {
  source: 'sop';
  split: string | null;
  file: string;
  user_id: string | null;
  outfit_id: string | null;
  matched: string | null;
}

export type TableRow = Record<string, string>;

export interface DeepFashionImage {
  outfit_uid: string;
  image_id: string;
  split: string;
  image_relpath: string;
}

export interface DeepFashionRecord extends DeepFashionImage {
  source: 'deep_fashion';
  dataset_root: string;
  user_ids: string[];
  items: { category: string; style: string }[];
  seasons: string[];
  occasions: string[];
  ratings: string[];
}

export type FrequencyTable = [string, number][];

export interface DeepFashionStats {
  dataset_root: string;
  images_total: number;
  images_by_split: Record<string, number>;
  records_with_metadata: number;
  records_missing_metadata: number;
  top_categories: FrequencyTable;
  top_styles: FrequencyTable;
}

export interface JoinSummary {
  outfits: number;
  items: number;
  resolved: number;
  percent: number;
  skipped: number;
}
