import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { generateFileName, LocalMediaStorage } from '../src/modules/upload/localStorage.service';

describe('LocalMediaStorage', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the file and serves it under /media', async () => {
    const storage = new LocalMediaStorage(dir);

    const url = await storage.store({ buffer: Buffer.from('img'), originalname: 'photo.PNG', mimetype: 'image/png' });

    expect(url).toMatch(/^\/media\/photo-\d+-[0-9a-f]{8}\.png$/);
    const filePath = storage.pathFromUrl(url);
    expect(filePath).not.toBeNull();
    expect(fs.readFileSync(path.join(dir, path.basename(url)), 'utf8')).toBe('img');

    await storage.remove(url);
    expect(fs.existsSync(path.join(dir, path.basename(url)))).toBe(false);
  });

  it('tolerates removing a file that is already gone', async () => {
    const storage = new LocalMediaStorage(dir);
    await expect(storage.remove('/media/missing.png')).resolves.toBeUndefined();
  });

  it('only maps its own URLs to paths', () => {
    const storage = new LocalMediaStorage(dir);
    expect(storage.pathFromUrl('https://cdn.example.com/a.png')).toBeNull();
    expect(storage.pathFromUrl('/media/../secret.txt')).toBeNull();
    expect(storage.pathFromUrl('/media/a.png')).toBe(path.join(dir, 'a.png'));
  });

  it('generates safe unique names', () => {
    expect(generateFileName('my lamp (1).jpg')).toMatch(/^my-lamp-1--\d+-[0-9a-f]{8}\.jpg$/);
  });
});
