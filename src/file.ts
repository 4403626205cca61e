import { readFile, writeFile } from 'fs/promises';
import { parse, parseCompressed, isCompressed } from './importers';
import { readGraph, writeGraph } from './graph/document';
import type { JsonObject, ReadGraphResult } from './graph/document';
import type { NodeStore } from './graph/store';
import type { Score } from './types';

/**
 * Parse a MusicXML file from disk
 * Automatically handles both .xml/.musicxml and .mxl formats
 * @param filePath - Path to the file
 */
export async function parseFile(filePath: string): Promise<Score> {
  const data = await readFile(filePath);

  // Check if it's a compressed file
  if (isCompressed(data)) {
    return parseCompressed(data);
  }

  return parse(data.toString('utf-8'));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load a JSON-LD graph document into `store`. A file that does not exist
 * yields an empty graph; unreadable JSON is an error.
 */
export async function loadGraphFile(filePath: string, store?: NodeStore): Promise<ReadGraphResult> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return readGraph(undefined, store);
    throw error;
  }
  const document: unknown = JSON.parse(text);
  return readGraph(document, store);
}

/** Write the store as a JSON-LD document, two-space indented. */
export async function saveGraphFile(filePath: string, store: NodeStore, context?: JsonObject): Promise<void> {
  await writeFile(filePath, formatGraph(store, context), 'utf-8');
}

export function formatGraph(store: NodeStore, context?: JsonObject): string {
  return JSON.stringify(writeGraph(store, context), null, 2) + '\n';
}
