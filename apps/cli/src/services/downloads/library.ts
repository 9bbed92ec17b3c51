import fs, { promises as fsp } from 'fs';
import path from 'path';
import { DownloadError, parsePaperRecord } from '@paperhub/shared';
import type { DownloadedPaper, PaperRecord } from '@paperhub/shared';
import { createLogger, type Logger } from '../logger';
import { describeError } from '../paper-search/http';
import { sidecarPath } from './naming';

async function readSidecar(pdfPath: string, logger: Logger): Promise<PaperRecord | null> {
  const jsonPath = sidecarPath(pdfPath);
  if (!fs.existsSync(jsonPath)) {
    return null;
  }
  try {
    const raw: unknown = JSON.parse(await fsp.readFile(jsonPath, 'utf-8'));
    return parsePaperRecord(raw);
  } catch (error) {
    logger.warn(`Ignoring unreadable metadata ${jsonPath}: ${describeError(error)}`);
    return null;
  }
}

/**
 * List downloaded PDFs under a hub directory, one category folder deep,
 * sorted by relative path.
 */
export async function listDownloads(
  hubDir: string,
  logger: Logger = createLogger('Downloads')
): Promise<DownloadedPaper[]> {
  if (!fs.existsSync(hubDir) || !fs.statSync(hubDir).isDirectory()) {
    throw new DownloadError(`Downloads directory does not exist: ${hubDir}`);
  }

  const papers: DownloadedPaper[] = [];
  const folders = await fsp.readdir(hubDir, { withFileTypes: true });

  for (const folder of folders) {
    if (!folder.isDirectory()) continue;
    const folderPath = path.join(hubDir, folder.name);
    const files = await fsp.readdir(folderPath, { withFileTypes: true });

    for (const file of files) {
      if (!file.isFile() || !file.name.toLowerCase().endsWith('.pdf')) continue;
      const pdfPath = path.join(folderPath, file.name);
      papers.push({
        pdfPath: path.resolve(pdfPath),
        relativePath: path.relative(hubDir, pdfPath).split(path.sep).join('/'),
        category: folder.name,
        metadata: await readSidecar(pdfPath, logger),
      });
    }
  }

  return papers.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}
