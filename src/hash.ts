/**
 * Pluggable content hashing for copied files.
 *
 * The recursive copier feeds each file's bytes through a fresh hasher and
 * records the hex digest per relative path, for consumption by whatever
 * writes the render manifest.
 */

import { createHash } from 'node:crypto';
import git from 'isomorphic-git';

export interface ContentHasher {
  update(chunk: Uint8Array): void;
  /** Hex digest of everything passed to `update`. */
  digest(): Promise<string>;
}

export type HasherFactory = () => ContentHasher;

/** SHA-256 of the raw bytes. */
export const sha256Hasher: HasherFactory = () => {
  const h = createHash('sha256');
  return {
    update(chunk) {
      h.update(chunk);
    },
    async digest() {
      return h.digest('hex');
    },
  };
};

/**
 * Git blob object id of the content (`sha1("blob <size>\0" + bytes)`), the
 * same id `git hash-object` prints for the file.
 */
export const gitBlobHasher: HasherFactory = () => {
  const chunks: Uint8Array[] = [];
  return {
    update(chunk) {
      chunks.push(chunk);
    },
    async digest() {
      const { oid } = await git.hashBlob({ object: Buffer.concat(chunks) });
      return oid;
    },
  };
};
