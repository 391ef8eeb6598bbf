import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { deflateRawSync } from 'node:zlib';
import { md5 } from '../src/checksum.js';
import { crc32 } from '../src/zip.js';
import { Par2Tool, type ParityCreateOptions, type ParityTool, type ParityVerifyOptions } from '../src/parity.js';
import { bookKey, type Book } from '../src/book.js';

/**
 * In-process stand-in for par2: the "recovery file" holds the MD5 of the
 * book as read through the link, and verify re-reads it the same way.
 */
export class FakeParity implements ParityTool {
  failCreate = false;
  failVerify = false;
  readonly calls: string[] = [];

  async create(opts: ParityCreateOptions): Promise<void> {
    this.calls.push(`create ${opts.target} -r${opts.redundancy}`);
    if (this.failCreate) throw new Error('par2create failed: disk full');
    const data = await readFile(join(opts.cwd, opts.target));
    await writeFile(join(opts.cwd, `${opts.target}.par2`), md5(data));
    await writeFile(join(opts.cwd, `${opts.target}.vol00+01.par2`), 'recovery blocks');
  }

  async verify(opts: ParityVerifyOptions): Promise<boolean> {
    this.calls.push(`verify ${opts.target}`);
    if (this.failVerify) return false;
    try {
      const expected = await readFile(join(opts.cwd, `${opts.target}.par2`), 'utf8');
      const data = await readFile(join(opts.cwd, opts.target));
      return md5(data) === expected;
    } catch {
      return false;
    }
  }

  isArtifact(target: string, fileName: string): boolean {
    return new Par2Tool().isArtifact(target, fileName);
  }
}

export interface ZipInput {
  name: string;
  data: Buffer;
  deflate?: boolean;
}

/**
 * Build a ZIP archive in memory (stored or deflated entries).
 */
export function packZip(entries: ZipInput[]): Buffer {
  const parts: Buffer[] = [];
  const central: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, 'utf8');
    const body = entry.deflate ? deflateRawSync(entry.data) : entry.data;
    const method = entry.deflate ? 8 : 0;
    const crc = crc32(entry.data);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(method, 8);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(body.length, 18);
    local.writeUInt32LE(entry.data.length, 22);
    local.writeUInt16LE(name.length, 26);
    parts.push(local, name, body);

    const header = Buffer.alloc(46);
    header.writeUInt32LE(0x02014b50, 0);
    header.writeUInt16LE(20, 4);
    header.writeUInt16LE(20, 6);
    header.writeUInt16LE(method, 10);
    header.writeUInt32LE(crc, 16);
    header.writeUInt32LE(body.length, 20);
    header.writeUInt32LE(entry.data.length, 24);
    header.writeUInt16LE(name.length, 28);
    header.writeUInt32LE(offset, 42);
    central.push(header, name);

    offset += local.length + name.length + body.length;
  }

  const directory = Buffer.concat(central);
  const eocd = Buffer.alloc(22);
  eocd.writeUInt32LE(0x06054b50, 0);
  eocd.writeUInt16LE(entries.length, 8);
  eocd.writeUInt16LE(entries.length, 10);
  eocd.writeUInt32LE(directory.length, 12);
  eocd.writeUInt32LE(offset, 16);

  return Buffer.concat([...parts, directory, eocd]);
}

/** A small EPUB-like archive: stored mimetype plus a deflated chapter. */
export function sampleEpub(chapter = 'It was a dark and stormy night.'): Buffer {
  return packZip([
    { name: 'mimetype', data: Buffer.from('application/epub+zip') },
    { name: 'chapter1.xhtml', data: Buffer.from(`<p>${chapter.repeat(20)}</p>`), deflate: true },
  ]);
}

export async function tempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `book-armor-${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeBook(bookDir: string, collection: string, name: string, data: string | Buffer): Promise<Book> {
  const path = join(bookDir, collection, name);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
  return { collection, name, path, key: bookKey(collection, name) };
}
