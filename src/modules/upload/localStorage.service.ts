import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../utils/logging';
import { MediaFile, MediaStorage } from './storage.service';

export const MEDIA_ROUTE = '/media';

/**
 * Unique, filesystem-safe name that keeps the original extension
 */
export const generateFileName = (originalName: string): string => {
  const ext = path.extname(originalName).toLowerCase();
  const baseName = path
    .basename(originalName, path.extname(originalName))
    .replace(/[^a-zA-Z0-9_-]+/g, '-')
    .slice(0, 40) || 'file';
  const timestamp = Date.now();
  const uuid = uuidv4().substring(0, 8);
  return `${baseName}-${timestamp}-${uuid}${ext}`;
};

/**
 * Files on local disk, served statically under /media
 */
export class LocalMediaStorage implements MediaStorage {
  private readonly uploadDir: string;

  constructor(uploadDir: string) {
    this.uploadDir = path.resolve(uploadDir);
  }

  get directory(): string {
    return this.uploadDir;
  }

  async store(file: MediaFile): Promise<string> {
    await fs.promises.mkdir(this.uploadDir, { recursive: true });

    const fileName = generateFileName(file.originalname);
    await fs.promises.writeFile(path.join(this.uploadDir, fileName), file.buffer);

    logger.info('[Media] Stored file', { fileName, mimetype: file.mimetype });
    return `${MEDIA_ROUTE}/${fileName}`;
  }

  async remove(url: string): Promise<void> {
    const filePath = this.pathFromUrl(url);
    if (!filePath) {
      logger.warn('[Media] Not a local media URL', { url });
      return;
    }

    try {
      await fs.promises.unlink(filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.warn('[Media] File already gone', { url });
        return;
      }
      throw error;
    }
  }

  /**
   * Disk path for a URL this storage produced, null for anything else
   */
  pathFromUrl(url: string): string | null {
    const prefix = `${MEDIA_ROUTE}/`;
    if (!url.startsWith(prefix)) {
      return null;
    }

    const fileName = url.slice(prefix.length);
    if (!fileName || fileName !== path.basename(fileName)) {
      return null;
    }
    return path.join(this.uploadDir, fileName);
  }
}
