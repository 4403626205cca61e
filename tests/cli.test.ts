import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli, USAGE } from '../src/cli';
import type { CliIo } from '../src/cli';
import { readGraph } from '../src/graph/document';
import type { ReadGraphResult } from '../src/graph/document';
import { silentLogger } from '../src/logger';
import type { LogContext } from '../src/logger';

const fixturePath = join(__dirname, 'fixtures', 'sonata.xml');

interface CapturedIo extends CliIo {
  output: string[];
  infos: [string, LogContext | undefined][];
}

function captureIo(): CapturedIo {
  const output: string[] = [];
  const infos: [string, LogContext | undefined][] = [];
  return {
    output,
    infos,
    stdout: (text) => {
      output.push(text);
    },
    logger: {
      ...silentLogger,
      info: (message, context) => {
        infos.push([message, context]);
      },
    },
  };
}

function readGraphText(text: string): ReadGraphResult {
  const document: unknown = JSON.parse(text);
  return readGraph(document);
}

describe('Command line', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'score-graph-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print usage with --help', async () => {
    const io = captureIo();
    expect(await runCli(['--help'], io)).toBe(0);
    expect(io.infos).toEqual([[USAGE, undefined]]);
  });

  it('should fail without an input file', async () => {
    const io = captureIo();
    expect(await runCli([], io)).toBe(2);
    expect(await runCli(['a.xml', 'b.jsonld', 'c.jsonld'], io)).toBe(2);
  });

  it('should reject unknown options', async () => {
    await expect(runCli([fixturePath, '--bogus'], captureIo())).rejects.toThrow();
  });

  it('should write the graph to stdout without an output path', async () => {
    const io = captureIo();
    expect(await runCli([fixturePath], io)).toBe(0);

    expect(io.output).toHaveLength(1);
    expect(io.output[0].endsWith('}\n')).toBe(true);
    const { store, context } = readGraphText(io.output[0]);
    expect(store.get('so:sonata')?.properties.get('dct:source')).toBe('sonata.xml');
    expect(store.get('so:sonata_M1_Measure_1_LCI')?.properties.get('so:LCIvalue')).toBe(0.7838);
    expect(context.mso).toBe('http://linkeddata.uni-muenster.de/ontology/musicscore#');

    expect(io.infos).toEqual([
      ['Built graph for sonata', { nodes: store.size, measures: 4, movements: 2, output: 'stdout' }],
    ]);
  });

  it('should write the graph to a file', async () => {
    const io = captureIo();
    const out = join(dir, 'sonata.jsonld');

    expect(await runCli([fixturePath, out, '--quiet'], io)).toBe(0);

    expect(io.output).toEqual([]);
    expect(io.infos).toEqual([]);
    const { store } = readGraphText(readFileSync(out, 'utf-8'));
    expect(store.get('so:sonata_M2_GCP')?.properties.get('so:globalComplexityIndex')).toBe(0.0803);
  });

  it('should merge into an existing graph', async () => {
    const existing = join(dir, 'existing.jsonld');
    const out = join(dir, 'merged.jsonld');
    writeFileSync(
      existing,
      JSON.stringify({
        '@context': { ex: 'http://example.org/' },
        '@graph': [{ '@id': 'ex:Review', '@type': 'ex:Annotation', 'ex:about': { '@id': 'so:sonata' } }],
      })
    );

    expect(await runCli([fixturePath, out, '--merge', existing, '--quiet'], captureIo())).toBe(0);

    const { store, context } = readGraphText(readFileSync(out, 'utf-8'));
    expect(context.ex).toBe('http://example.org/');
    expect(store.nodes()[0].id).toBe('ex:Review');
    expect(store.has('so:sonata_M1_GCP')).toBe(true);
  });

  it('should start empty when the merge file does not exist', async () => {
    const out = join(dir, 'out.jsonld');
    expect(await runCli([fixturePath, out, '--merge', join(dir, 'missing.jsonld'), '--quiet'], captureIo())).toBe(0);
    expect(existsSync(out)).toBe(true);
  });

  it('should apply weights from a file', async () => {
    const weights = join(dir, 'weights.json');
    const out = join(dir, 'out.jsonld');
    writeFileSync(
      weights,
      JSON.stringify({
        noteCount: 1,
        measureAccidentalCount: 0,
        subdivisionIndex: 0,
        minNoteValue: 0,
        dynamicCount: 0,
        articulationCount: 0,
      })
    );

    expect(await runCli([fixturePath, out, '--weights', weights, '--quiet'], captureIo())).toBe(0);

    const { store } = readGraphText(readFileSync(out, 'utf-8'));
    expect(store.get('so:sonata_M1_Measure_1_LCI')?.properties.get('so:LCIvalue')).toBe(1);
    expect(store.get('so:sonata_M1_Measure_2_LCI')?.properties.get('so:LCIvalue')).toBe(0.5);
    expect(store.get('so:sonata_M2_Measure_1_LCI')?.properties.get('so:LCIvalue')).toBe(0);
  });

  it('should reject unknown metrics in the weights file', async () => {
    const weights = join(dir, 'weights.json');
    writeFileSync(weights, JSON.stringify({ tempo: 1 }));

    await expect(runCli([fixturePath, '--weights', weights, '--quiet'], captureIo())).rejects.toThrow(
      'Unknown complexity metric "tempo"'
    );
  });
});
