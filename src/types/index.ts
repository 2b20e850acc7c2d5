/**
 * Core types for the daily front pages collector
 */

export type SiteTag = 'fp' | 'zg';

export interface DownloadedImage {
  /** Normalized target name */
  target: string;
  site: SiteTag;
  path: string;
  sourceUrl: string;
}

export interface RunResult {
  images: DownloadedImage[];
  missing: string[];
}

export type PipelineStatus = 'completed' | 'aborted';

export interface PipelineResult {
  status: PipelineStatus;
  targets: number;
  downloaded: DownloadedImage[];
  missing: string[];
  documentPath: string | null;
  durationMs: number;
}
