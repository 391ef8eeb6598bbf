import { open, type FileHandle } from 'node:fs/promises';
import { md5File } from './checksum.js';
import { isZip, testZip, type ZipSource } from './zip.js';
import type { Book } from './book.js';

export type ChecksumCheck =
  | { ok: true; checksum: string }
  | { ok: false; expected: string; actual: string };

export type StructureCheck =
  /** Not a ZIP container, or one with entries that cannot be tested (`reason`) */
  | { status: 'skipped'; reason?: string }
  | { status: 'passed'; entries: number }
  | { status: 'failed'; reason: string };

function fileSource(handle: FileHandle, size: number): ZipSource {
  return {
    size,
    async read(position, length) {
      const buf = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buf, 0, length, position);
      return buf.subarray(0, bytesRead);
    },
  };
}

/**
 * Content checks for a single book.
 */
export class Verifier {
  /** Recompute the book's checksum and compare it with the ledger's. */
  async verifyChecksum(book: Book, expected: string): Promise<ChecksumCheck> {
    const actual = await md5File(book.path);
    if (actual === expected.toLowerCase()) return { ok: true, checksum: actual };
    return { ok: false, expected, actual };
  }

  /**
   * Test the archive structure when the book's content is a ZIP container,
   * whatever its extension. Anything else is skipped.
   */
  async verifyContainerStructure(book: Book): Promise<StructureCheck> {
    const handle = await open(book.path, 'r');
    try {
      const source = fileSource(handle, (await handle.stat()).size);
      if (!isZip(await source.read(0, 4))) return { status: 'skipped' };
      const result = await testZip(source);
      switch (result.status) {
        case 'passed': return { status: 'passed', entries: result.entries };
        case 'skipped': return { status: 'skipped', reason: result.reason };
        case 'failed': return { status: 'failed', reason: result.reason };
      }
    } finally {
      await handle.close();
    }
  }
}
