import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

/**
 * Writes through a temp file in the same directory and renames it over
 * `destination`, so readers holding the old file keep reading it whole.
 */
export function writeFileAtomic(destination: string, data: Uint8Array): void {
  fs.mkdirSync(path.dirname(destination), { recursive: true });
  const tmp = `${destination}.${process.pid}.${crypto.randomUUID()}.tmp`;
  try {
    fs.writeFileSync(tmp, data);
    fs.renameSync(tmp, destination);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}
