/**
 * @fileoverview Content digest utilities
 *
 * FORMAT: sha256 hex over raw file bytes (no line-ending or BOM normalization)
 * USED BY: snapshot builder | tree mirror
 */
import { createHash } from 'crypto';
import { createReadStream } from 'fs';

/**
 * Port for hashing a file on disk, so the snapshot retry policy can be
 * exercised without real file locks
 */
export interface FileHasher {
  hashFile(absolutePath: string): Promise<string>;
}

/**
 * Compute SHA-256 of a file's bytes, streamed
 *
 * @param absolutePath - File to hash
 * @returns SHA-256 hash as 64-character hex string
 */
export function hashFileSha256(absolutePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    const stream = createReadStream(absolutePath);

    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export const sha256FileHasher: FileHasher = {
  hashFile: hashFileSha256
};
