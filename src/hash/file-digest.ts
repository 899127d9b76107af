/**
 * Content digests of files on disk, used to confirm a RAW select is a
 * byte-identical copy of its original before the two are hard-linked.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';

/**
 * Hex MD5 digest of a file, streamed so large RAW files are never held in memory.
 */
export async function fileDigest(filePath: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Whether two paths are the same file (one is a hard link of the other).
 */
export async function isSameFile(a: string, b: string): Promise<boolean> {
  const [statA, statB] = await Promise.all([stat(a), stat(b)]);
  return statA.dev === statB.dev && statA.ino === statB.ino;
}

export interface ContentComparison {
  identical: boolean;
  digestA: string;
  digestB: string;
}

/**
 * Compare two files by digest.
 */
export async function compareContents(a: string, b: string): Promise<ContentComparison> {
  const [digestA, digestB] = await Promise.all([fileDigest(a), fileDigest(b)]);
  return { identical: digestA === digestB, digestA, digestB };
}
