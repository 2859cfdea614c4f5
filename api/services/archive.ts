import JSZip from 'jszip';
import { InvalidArgumentError } from './errors';

export interface ArchiveEntry {
  name: string;
  text: string;
}

export function isPlainTextEntry(name: string) {
  return name.toLowerCase().endsWith('.txt') && !name.startsWith('__MACOSX/');
}

export function decodeText(bytes: Uint8Array) {
  return Buffer.from(bytes).toString('utf-8');
}

/**
 * Lists the plain-text entries of a zip archive, keyed by their path inside
 * it. Directories and other files are skipped.
 */
export async function readTextEntries(bytes: Uint8Array): Promise<ArchiveEntry[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new InvalidArgumentError(`Not a readable zip archive: ${error instanceof Error ? error.message : String(error)}`);
  }

  const entries: ArchiveEntry[] = [];
  for (const file of Object.values(zip.files)) {
    if (file.dir || !isPlainTextEntry(file.name)) continue;
    entries.push({ name: file.name, text: decodeText(await file.async('uint8array')) });
  }
  return entries;
}
