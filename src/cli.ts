/**
 * score-graph command line
 *
 *   score-graph <score.xml|score.mxl> [out.jsonld]
 *               [--merge existing.jsonld] [--weights weights.json] [--quiet]
 *
 * Builds the graph of a score and writes it as JSON-LD to `out.jsonld`, or
 * to stdout when no output path is given. `--merge` loads an earlier graph
 * document first so the passes extend it instead of starting empty.
 */

import { parseArgs } from 'node:util';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { parseFile, loadGraphFile, saveGraphFile, formatGraph } from './file';
import { buildGraph } from './pipeline';
import { parseWeights } from './complexity';
import type { ComplexityWeights } from './complexity';
import { workIdFromPath } from './id';
import { consoleLogger, silentLogger } from './logger';
import type { Logger } from './logger';
import type { JsonObject } from './graph/document';

export const USAGE =
  'Usage: score-graph <score.xml|score.mxl> [out.jsonld] [--merge existing.jsonld] [--weights weights.json] [--quiet]';

export interface CliIo {
  stdout: (text: string) => void;
  logger: Logger;
}

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  logger: consoleLogger,
};

/** Run the command line; resolves to the process exit code. */
export async function runCli(args: string[], io: CliIo = defaultIo): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      merge: { type: 'string' },
      weights: { type: 'string' },
      quiet: { type: 'boolean', short: 'q', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  const logger = values.quiet ? silentLogger : io.logger;
  const [inputPath, outputPath] = positionals;

  if (values.help || inputPath === undefined || positionals.length > 2) {
    logger.info(USAGE);
    return values.help ? 0 : 2;
  }

  let weights: Partial<ComplexityWeights> = {};
  if (values.weights !== undefined) {
    const parsed: unknown = JSON.parse(await readFile(values.weights, 'utf-8'));
    weights = parseWeights(parsed);
  }

  const score = await parseFile(inputPath);
  const existing = values.merge !== undefined ? await loadGraphFile(values.merge) : undefined;
  for (const diagnostic of existing?.diagnostics ?? []) {
    logger.warn(diagnostic.message, { code: diagnostic.code });
  }

  const workId = workIdFromPath(inputPath);
  const result = buildGraph(score, workId, existing?.store, {
    sourceName: basename(inputPath),
    weights,
    logger,
  });

  const context: JsonObject = existing?.context ?? {};
  if (outputPath === undefined) {
    io.stdout(formatGraph(result.store, context));
  } else {
    await saveGraphFile(outputPath, result.store, context);
  }

  logger.info(`Built graph for ${workId}`, {
    nodes: result.store.size,
    measures: result.complexity?.measures.length ?? 0,
    movements: result.complexity?.movements.length ?? 0,
    output: outputPath ?? 'stdout',
  });
  return 0;
}
