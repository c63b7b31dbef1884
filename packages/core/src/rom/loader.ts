import { readFile } from 'node:fs/promises';
import { RomLoadError } from '../errors.js';

// Reads the whole file before anything touches emulator state, so a failed
// read leaves the running system as it was.
export async function readRomFile(path: string): Promise<Uint8Array> {
  try {
    const buf = await readFile(path);
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  } catch (e) {
    throw new RomLoadError(path, e);
  }
}
