export { downloadPaper, DEFAULT_CHUNK_SIZE, DEFAULT_DOWNLOAD_TIMEOUT_MS } from './pipeline';
export type { DownloadDeps, PipelineOptions } from './pipeline';
export { listDownloads } from './library';
export {
  slugify,
  idSuffix,
  pdfFileName,
  categoryFolder,
  sidecarPath,
  MAX_SLUG_LENGTH,
  UNKNOWN_CATEGORY,
} from './naming';
