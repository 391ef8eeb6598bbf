import { describe, it } from 'node:test';
import assert from 'node:assert';
import { bufferSource, crc32, isZip, testZip, type ZipSource } from '../src/zip.js';
import { packZip, sampleEpub } from './fixtures.js';

function centralDirectoryOffset(zip: Buffer): number {
  return zip.readUInt32LE(zip.length - 22 + 16);
}

describe('crc32', () => {
  it('should match the standard check value', () => {
    assert.strictEqual(crc32(Buffer.from('123456789')), 0xcbf43926);
  });

  it('should be zero for no data', () => {
    assert.strictEqual(crc32(Buffer.alloc(0)), 0);
  });
});

describe('isZip', () => {
  it('should recognise zip-based books by content', () => {
    assert.strictEqual(isZip(sampleEpub()), true);
    assert.strictEqual(isZip(packZip([])), true);
  });

  it('should reject other content', () => {
    assert.strictEqual(isZip(Buffer.from('%PDF-1.7')), false);
    assert.strictEqual(isZip(Buffer.from('PK')), false);
    assert.strictEqual(isZip(Buffer.alloc(0)), false);
  });
});

describe('testZip', () => {
  it('should pass a healthy archive with stored and deflated entries', async () => {
    assert.deepStrictEqual(await testZip(sampleEpub()), { status: 'passed', entries: 2 });
  });

  it('should pass an empty archive', async () => {
    assert.deepStrictEqual(await testZip(packZip([])), { status: 'passed', entries: 0 });
  });

  it('should catch a flipped byte in a stored entry', async () => {
    const zip = sampleEpub();
    // mimetype data starts after the 30-byte local header and its 8-byte name
    zip[40] ^= 0xff;
    const result = await testZip(zip);
    assert.strictEqual(result.status, 'failed');
    if (result.status === 'failed') {
      assert.match(result.reason, /^mimetype: bad CRC [0-9a-f]{8} \(should be [0-9a-f]{8}\)$/);
      assert.strictEqual(result.entries, 0);
    }
  });

  it('should catch damage inside a deflated entry', async () => {
    const zip = sampleEpub();
    const start = 38 + 20 + 30 + 'chapter1.xhtml'.length;
    const end = centralDirectoryOffset(zip);
    zip[start + Math.floor((end - start) / 2)] ^= 0xff;
    const result = await testZip(zip);
    assert.strictEqual(result.status, 'failed');
    if (result.status === 'failed') {
      assert.ok(result.reason.startsWith('chapter1.xhtml: '), result.reason);
      assert.strictEqual(result.entries, 1);
    }
  });

  it('should fail when the end of the archive is cut off', async () => {
    const zip = sampleEpub();
    assert.deepStrictEqual(await testZip(zip.subarray(0, zip.length - 10)), {
      status: 'failed',
      entries: 0,
      reason: 'end of central directory not found',
    });
  });

  it('should fail on data that is not an archive', async () => {
    assert.deepStrictEqual(await testZip(Buffer.from('not a zip at all')), {
      status: 'failed',
      entries: 0,
      reason: 'end of central directory not found',
    });
  });

  it('should fail when entry data runs past the end', async () => {
    const zip = sampleEpub();
    const second = centralDirectoryOffset(zip) + 46 + 'mimetype'.length;
    zip.writeUInt32LE(100000, second + 20);
    assert.deepStrictEqual(await testZip(zip), {
      status: 'failed',
      entries: 1,
      reason: 'chapter1.xhtml: entry data truncated',
    });
  });

  it('should fail on a bad local header offset', async () => {
    const zip = sampleEpub();
    const second = centralDirectoryOffset(zip) + 46 + 'mimetype'.length;
    zip.writeUInt32LE(5, second + 42);
    assert.deepStrictEqual(await testZip(zip), {
      status: 'failed',
      entries: 1,
      reason: 'chapter1.xhtml: bad local header',
    });
  });

  it('should skip, not fail, entries in a method it cannot inflate', async () => {
    const zip = sampleEpub();
    // deflate64, which unzip -t accepts
    zip.writeUInt16LE(9, centralDirectoryOffset(zip) + 10);
    assert.deepStrictEqual(await testZip(zip), {
      status: 'skipped',
      entries: 1,
      reason: 'mimetype: compression method 9 not supported',
    });
  });

  it('should still fail a damaged entry next to an untestable one', async () => {
    const zip = sampleEpub();
    zip.writeUInt16LE(9, centralDirectoryOffset(zip) + 10);
    const second = centralDirectoryOffset(zip) + 46 + 'mimetype'.length;
    zip.writeUInt32LE(100000, second + 20);
    assert.deepStrictEqual(await testZip(zip), {
      status: 'failed',
      entries: 0,
      reason: 'chapter1.xhtml: entry data truncated',
    });
  });

  it('should refuse encrypted entries', async () => {
    const zip = sampleEpub();
    zip.writeUInt16LE(1, centralDirectoryOffset(zip) + 8);
    assert.deepStrictEqual(await testZip(zip), {
      status: 'failed',
      entries: 0,
      reason: 'mimetype: encrypted entry cannot be tested',
    });
  });

  it('should follow a ZIP64 end of central directory', async () => {
    const zip = sampleEpub();
    const eocdAt = zip.length - 22;
    const cdSize = zip.readUInt32LE(eocdAt + 12);
    const cdOffset = zip.readUInt32LE(eocdAt + 16);

    const record = Buffer.alloc(56);
    record.writeUInt32LE(0x06064b50, 0);
    record.writeBigUInt64LE(44n, 4);
    record.writeBigUInt64LE(2n, 24);
    record.writeBigUInt64LE(2n, 32);
    record.writeBigUInt64LE(BigInt(cdSize), 40);
    record.writeBigUInt64LE(BigInt(cdOffset), 48);

    const locator = Buffer.alloc(20);
    locator.writeUInt32LE(0x07064b50, 0);
    locator.writeBigUInt64LE(BigInt(eocdAt), 8);
    locator.writeUInt32LE(1, 16);

    const eocd = Buffer.from(zip.subarray(eocdAt));
    eocd.writeUInt16LE(0xffff, 8);
    eocd.writeUInt16LE(0xffff, 10);
    eocd.writeUInt32LE(0xffffffff, 12);
    eocd.writeUInt32LE(0xffffffff, 16);

    const zip64 = Buffer.concat([zip.subarray(0, eocdAt), record, locator, eocd]);
    assert.deepStrictEqual(await testZip(zip64), { status: 'passed', entries: 2 });
  });

  it('should read the archive piecewise through a source', async () => {
    // larger than the window scanned for the end record
    const zip = packZip([{ name: 'scan.png', data: Buffer.alloc(100000, 7) }]);
    const inner = bufferSource(zip);
    let largest = 0;
    const source: ZipSource = {
      size: inner.size,
      read: (position, length) => {
        largest = Math.max(largest, length);
        return inner.read(position, length);
      },
    };
    assert.deepStrictEqual(await testZip(source), { status: 'passed', entries: 1 });
    assert.ok(largest < zip.length, `read ${largest} of ${zip.length} bytes at once`);
  });

  it('should fail when a source comes up short', async () => {
    const zip = sampleEpub();
    const source: ZipSource = {
      size: zip.length + 100,
      read: async (position, length) => zip.subarray(position, position + length),
    };
    assert.deepStrictEqual(await testZip(source), {
      status: 'failed',
      entries: 0,
      reason: 'unexpected end of archive',
    });
  });
});
