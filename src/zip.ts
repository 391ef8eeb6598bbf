/**
 * Minimal ZIP structure test — no dependencies.
 * Walks the central directory, re-reads every entry through its local header
 * and checks the inflated size and CRC-32 against the recorded values
 * (the same ground `unzip -t` covers). Stored and deflated entries, ZIP64.
 * The archive is read piecewise, so books larger than a Buffer can hold
 * are tested from their file handle.
 */

import { inflateRawSync } from 'node:zlib';

const SIG_LOCAL = 0x04034b50;
const SIG_CENTRAL = 0x02014b50;
const SIG_EOCD = 0x06054b50;
const SIG_ZIP64_EOCD = 0x06064b50;
const SIG_ZIP64_LOCATOR = 0x07064b50;

const EOCD_SIZE = 22;
const CENTRAL_SIZE = 46;
const LOCAL_SIZE = 30;
const MAX_COMMENT = 0xffff;
const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

/**
 * CRC-32 (IEEE 802.3), as stored in ZIP headers.
 */
export function crc32(data: Uint8Array): number {
  let c = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    c = CRC_TABLE[(c ^ data[i]) & 0xff] ^ (c >>> 8);
  }
  return (c ^ 0xffffffff) >>> 0;
}

/**
 * True when `head` starts with a ZIP signature. EPUB, CBZ, DOCX and other
 * zip-based containers match regardless of their extension.
 */
export function isZip(head: Buffer): boolean {
  if (head.length < 4 || head[0] !== 0x50 || head[1] !== 0x4b) return false;
  const sig = head.readUInt32LE(0);
  // local file header, empty archive, spanned archive marker
  return sig === SIG_LOCAL || sig === SIG_EOCD || sig === 0x08074b50;
}

/**
 * Random access to the archive bytes.
 */
export interface ZipSource {
  readonly size: number;
  /** Up to `length` bytes from `position`; fewer only at the end. */
  read(position: number, length: number): Promise<Buffer>;
}

export function bufferSource(buf: Buffer): ZipSource {
  return {
    size: buf.length,
    read: async (position, length) => buf.subarray(position, position + length),
  };
}

export type ZipTestResult =
  | { status: 'passed'; entries: number }
  /** Structurally sound, but an entry uses a method this test cannot inflate */
  | { status: 'skipped'; entries: number; reason: string }
  | { status: 'failed'; entries: number; reason: string };

class ZipFault extends Error {}

interface Directory {
  total: number;
  offset: number;
  size: number;
}

async function readExact(src: ZipSource, position: number, length: number): Promise<Buffer> {
  if (position < 0 || position + length > src.size) throw new ZipFault('unexpected end of archive');
  const buf = await src.read(position, length);
  if (buf.length < length) throw new ZipFault('unexpected end of archive');
  return buf;
}

async function findEndOfCentralDirectory(src: ZipSource): Promise<{ at: number; record: Buffer }> {
  const tailLength = Math.min(src.size, EOCD_SIZE + MAX_COMMENT);
  const base = src.size - tailLength;
  const tail = await readExact(src, base, tailLength);
  for (let i = tail.length - EOCD_SIZE; i >= 0; i--) {
    if (tail.readUInt32LE(i) === SIG_EOCD) {
      return { at: base + i, record: tail.subarray(i, i + EOCD_SIZE) };
    }
  }
  throw new ZipFault('end of central directory not found');
}

async function readDirectory(src: ZipSource, eocd: { at: number; record: Buffer }): Promise<Directory> {
  const total = eocd.record.readUInt16LE(10);
  const size = eocd.record.readUInt32LE(12);
  const offset = eocd.record.readUInt32LE(16);
  if (total !== U16_MAX && size !== U32_MAX && offset !== U32_MAX) {
    return { total, size, offset };
  }

  const at = eocd.at - 20;
  const locator = at < 0 ? undefined : await readExact(src, at, 20);
  if (!locator || locator.readUInt32LE(0) !== SIG_ZIP64_LOCATOR) {
    throw new ZipFault('ZIP64 locator missing');
  }
  const record = await readExact(src, Number(locator.readBigUInt64LE(8)), 56);
  if (record.readUInt32LE(0) !== SIG_ZIP64_EOCD) {
    throw new ZipFault('ZIP64 end of central directory not found');
  }
  return {
    total: Number(record.readBigUInt64LE(32)),
    size: Number(record.readBigUInt64LE(40)),
    offset: Number(record.readBigUInt64LE(48)),
  };
}

/**
 * Replace 0xffffffff placeholders with the values from the ZIP64 extra field.
 */
function applyZip64Extra(
  extra: Buffer,
  sizes: { size: number; compressed: number; offset: number },
): void {
  let p = 0;
  while (p + 4 <= extra.length) {
    const id = extra.readUInt16LE(p);
    const len = extra.readUInt16LE(p + 2);
    if (id === 0x0001) {
      let q = p + 4;
      if (sizes.size === U32_MAX) { sizes.size = Number(extra.readBigUInt64LE(q)); q += 8; }
      if (sizes.compressed === U32_MAX) { sizes.compressed = Number(extra.readBigUInt64LE(q)); q += 8; }
      if (sizes.offset === U32_MAX) { sizes.offset = Number(extra.readBigUInt64LE(q)); }
      return;
    }
    p += 4 + len;
  }
}

function inflateEntry(name: string, method: number, raw: Buffer): Buffer {
  if (method === METHOD_STORED) return raw;
  try {
    return inflateRawSync(raw);
  } catch (err) {
    throw new ZipFault(`${name}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Test every entry of a ZIP archive, held in memory or behind a `ZipSource`.
 */
export async function testZip(source: Buffer | ZipSource): Promise<ZipTestResult> {
  const src = Buffer.isBuffer(source) ? bufferSource(source) : source;
  let tested = 0;
  let untestable: string | undefined;
  try {
    const dir = await readDirectory(src, await findEndOfCentralDirectory(src));
    const central = await readExact(src, dir.offset, dir.size);
    let p = 0;

    for (let i = 0; i < dir.total; i++) {
      if (central.readUInt32LE(p) !== SIG_CENTRAL) {
        throw new ZipFault(`bad central directory entry #${i + 1}`);
      }
      const flags = central.readUInt16LE(p + 8);
      const method = central.readUInt16LE(p + 10);
      const crc = central.readUInt32LE(p + 16);
      const nameLen = central.readUInt16LE(p + 28);
      const extraLen = central.readUInt16LE(p + 30);
      const commentLen = central.readUInt16LE(p + 32);
      const sizes = {
        compressed: central.readUInt32LE(p + 20),
        size: central.readUInt32LE(p + 24),
        offset: central.readUInt32LE(p + 42),
      };
      const nameEnd = p + CENTRAL_SIZE + nameLen;
      const name = central.toString('utf8', p + CENTRAL_SIZE, nameEnd);
      applyZip64Extra(central.subarray(nameEnd, nameEnd + extraLen), sizes);
      p = nameEnd + extraLen + commentLen;

      if (flags & 1) throw new ZipFault(`${name}: encrypted entry cannot be tested`);

      if (sizes.offset + LOCAL_SIZE > src.size) throw new ZipFault(`${name}: bad local header`);
      const local = await readExact(src, sizes.offset, LOCAL_SIZE);
      if (local.readUInt32LE(0) !== SIG_LOCAL) {
        throw new ZipFault(`${name}: bad local header`);
      }
      const start = sizes.offset + LOCAL_SIZE + local.readUInt16LE(26) + local.readUInt16LE(28);
      const end = start + sizes.compressed;
      if (end > src.size) throw new ZipFault(`${name}: entry data truncated`);

      if (method !== METHOD_STORED && method !== METHOD_DEFLATE) {
        // Deflate64, bzip2 and friends: sound as far as the headers go.
        untestable ??= `${name}: compression method ${method} not supported`;
        continue;
      }

      const data = inflateEntry(name, method, await readExact(src, start, sizes.compressed));
      if (data.length !== sizes.size) {
        throw new ZipFault(`${name}: size ${data.length}, expected ${sizes.size}`);
      }
      const actual = crc32(data);
      if (actual !== crc) {
        throw new ZipFault(`${name}: bad CRC ${actual.toString(16).padStart(8, '0')} (should be ${crc.toString(16).padStart(8, '0')})`);
      }

      tested++;
    }
  } catch (err) {
    if (err instanceof ZipFault) return { status: 'failed', entries: tested, reason: err.message };
    if (err instanceof RangeError) return { status: 'failed', entries: tested, reason: 'unexpected end of archive' };
    throw err;
  }
  if (untestable !== undefined) return { status: 'skipped', entries: tested, reason: untestable };
  return { status: 'passed', entries: tested };
}
