import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

/**
 * Compute the MD5 hex digest of a file, streaming its contents.
 * MD5 keeps the ledger readable by `md5sum -c`.
 */
export function md5File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    const input = createReadStream(filePath);
    input.on('data', (chunk) => hash.update(chunk));
    input.on('end', () => resolve(hash.digest('hex')));
    input.on('error', reject);
  });
}

/**
 * Compute the MD5 hex digest of a buffer.
 */
export function md5(data: Buffer | string): string {
  return createHash('md5').update(data).digest('hex');
}
