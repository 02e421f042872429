/**
 * Where product images live. The database keeps only the returned URL.
 */

export interface MediaFile {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
}

export interface MediaStorage {
  /** Persists the file and returns the URL it is served under */
  store(file: MediaFile): Promise<string>;
  remove(url: string): Promise<void>;
}

export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];
