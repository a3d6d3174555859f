// src/core/export/media.ts
import * as fs from 'fs/promises';
import { join } from 'path';
import { MEDIA_EXTENSION } from '../config/constants.js';
import { HarvestError, ErrorCode } from '../errors.js';

/** Writes fetched media bytes as `<dir>/<id>.mp4`. */
export class MediaStore {
  private prepared = false;

  constructor(private downloadDir: string) {}

  async save(id: string, bytes: Uint8Array): Promise<string> {
    if (bytes.byteLength === 0) {
      throw new HarvestError(ErrorCode.MEDIA_UNAVAILABLE, `Empty media payload for ${id}`, true);
    }

    if (!this.prepared) {
      await fs.mkdir(this.downloadDir, { recursive: true });
      this.prepared = true;
    }

    const filepath = this.pathFor(id);
    // The final name only ever holds complete files.
    const partial = `${filepath}.part`;
    await fs.writeFile(partial, bytes);
    await fs.rename(partial, filepath);
    return filepath;
  }

  pathFor(id: string): string {
    return join(this.downloadDir, `${sanitizeFilename(id)}.${MEDIA_EXTENSION}`);
  }
}

export function sanitizeFilename(id: string): string {
  const cleaned = id.replace(/[^\w.-]/g, '_').replace(/^\.+/, '_');
  return cleaned.length > 0 ? cleaned : '_';
}
