import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const hashString = (input: string) => createHash('sha256').update(input).digest('hex');

export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(filePath)
      .on('data', chunk => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/** Map the first 48 bits of a hex digest onto [0, 1). */
export function unitInterval(hexDigest: string): number {
  return parseInt(hexDigest.slice(0, 12), 16) / 2 ** 48;
}
