import { unzipSync, strFromU8 } from 'fflate';
import { parse } from './musicxml';
import type { Score } from '../types';

const CONTAINER_PATH = 'META-INF/container.xml';
const COMMON_ROOT_NAMES = ['score.xml', 'musicxml.xml'];

/**
 * Locate the MusicXML root file of an unpacked .mxl archive: the first
 * rootfile named by META-INF/container.xml, else the only .xml entry,
 * else a conventional name.
 */
export function findRootFile(files: Record<string, Uint8Array>): string | undefined {
  const containerData = files[CONTAINER_PATH];
  if (containerData) {
    const rootfileMatch = strFromU8(containerData).match(/full-path="([^"]+)"/);
    if (rootfileMatch && files[rootfileMatch[1]]) {
      return rootfileMatch[1];
    }
  }

  const xmlFiles = Object.keys(files).filter(
    (name) => (name.endsWith('.xml') || name.endsWith('.musicxml')) && !name.startsWith('META-INF')
  );
  if (xmlFiles.length === 1) {
    return xmlFiles[0];
  }

  return COMMON_ROOT_NAMES.find((name) => files[name] !== undefined);
}

/**
 * Parse a compressed MusicXML (.mxl) file
 * @param data - The compressed file data as Uint8Array or Buffer
 */
export function parseCompressed(data: Uint8Array): Score {
  const files = unzipSync(data);
  const rootFilePath = findRootFile(files);

  if (!rootFilePath) {
    throw new Error('Could not find MusicXML file in compressed archive');
  }

  return parse(strFromU8(files[rootFilePath]));
}

/**
 * Check if data is a compressed MusicXML file
 * @returns true if the data appears to be a ZIP file
 */
export function isCompressed(data: Uint8Array): boolean {
  // ZIP files start with PK (0x50 0x4B)
  return data.length >= 2 && data[0] === 0x50 && data[1] === 0x4b;
}

/**
 * Parse either compressed (.mxl) or uncompressed (.xml/.musicxml) MusicXML,
 * detecting the format from the data
 */
export function parseAuto(data: Uint8Array | string): Score {
  if (typeof data === 'string') {
    return parse(data);
  }

  if (isCompressed(data)) {
    return parseCompressed(data);
  }

  return parse(strFromU8(data));
}
