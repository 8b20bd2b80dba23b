// engine/artifactStore.ts
// Where result and report files end up. The engine only sees ArtifactStore.

import fs from 'node:fs/promises';
import path from 'node:path';
import { put } from '@vercel/blob';

export interface ArtifactStore {
  /** Persist `content` under `name`; resolves to the artifact's location (path or URL). */
  save(name: string, content: Buffer, contentType: string): Promise<string>;
}

/** Writes into a local directory (created on demand). Location = absolute path. */
export function createLocalArtifactStore(dir: string): ArtifactStore {
  const root = path.resolve(dir);
  return {
    async save(name, content) {
      await fs.mkdir(root, { recursive: true });
      const target = path.join(root, name);
      await fs.writeFile(target, content);
      return target;
    }
  };
}

/**
 * Vercel Blob store. Pathname pattern: {prefix}{name}. Location = public blob URL.
 * Keep `prefix` aligned with the cleanup cron (api/cron/cleanupResults.ts).
 */
export function createBlobArtifactStore(prefix: string): ArtifactStore {
  return {
    async save(name, content, contentType) {
      const blob = await put(`${prefix}${name}`, content, {
        access: 'public',
        contentType,
        addRandomSuffix: false
      });
      return blob.url;
    }
  };
}
