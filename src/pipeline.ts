import type { Score } from './types';
import { NodeStore } from './graph/store';
import { buildMetadata, firstKeySignature } from './passes/metadata';
import type { KeyInference } from './passes/metadata';
import { buildStructure } from './passes/structure';
import { buildNotation } from './passes/notation';
import { attachExpression } from './passes/expression';
import { labelOneSegmenter } from './passes/segmenter';
import type { MovementSegmenter } from './passes/segmenter';
import { computeComplexity } from './complexity';
import type { ComplexityReport, ComplexityWeights } from './complexity';
import { silentLogger } from './logger';
import type { Logger } from './logger';
import type { PassReport } from './diagnostics';

export type PassName = 'metadata' | 'structure' | 'notation' | 'expression' | 'complexity';

/** Passes in the order they run */
export const PASS_ORDER: readonly PassName[] = ['metadata', 'structure', 'notation', 'expression', 'complexity'];

export interface PipelineOptions {
  /** Passes to run; always executed in `PASS_ORDER` (default: all) */
  passes?: readonly PassName[];
  segmenter?: MovementSegmenter;
  keyInference?: KeyInference;
  /** Raw complexity weights; missing entries keep their default */
  weights?: Partial<ComplexityWeights>;
  /** File name recorded as the work's `dct:source` */
  sourceName?: string;
  logger?: Logger;
}

const DEFAULT_OPTIONS: Required<Omit<PipelineOptions, 'sourceName'>> = {
  passes: PASS_ORDER,
  segmenter: labelOneSegmenter,
  keyInference: firstKeySignature,
  weights: {},
  logger: silentLogger,
};

export interface PipelineResult {
  store: NodeStore;
  reports: PassReport[];
  /** Present when the complexity pass ran */
  complexity?: ComplexityReport;
}

/**
 * Run the selected passes over a score, merging into `store` when given.
 *
 * Passes cooperate only through the store and the positional ids, so any
 * subset can run in any session: a later run of the complexity pass on a
 * graph loaded from disk sees the events an earlier run created.
 */
export function buildGraph(
  score: Score,
  workId: string,
  store: NodeStore = new NodeStore(),
  options: PipelineOptions = {}
): PipelineResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const { logger } = opts;
  const selected = new Set(opts.passes);
  const passOptions = { workId, segmenter: opts.segmenter };
  const reports: PassReport[] = [];
  let complexity: ComplexityReport | undefined;

  for (const pass of PASS_ORDER) {
    if (!selected.has(pass)) continue;
    const before = store.size;

    switch (pass) {
      case 'metadata':
        reports.push(
          buildMetadata(store, score, { workId, sourceName: opts.sourceName, keyInference: opts.keyInference })
        );
        break;
      case 'structure':
        reports.push(buildStructure(store, score, passOptions));
        break;
      case 'notation':
        reports.push(buildNotation(store, score, passOptions));
        break;
      case 'expression':
        reports.push(attachExpression(store, score, passOptions));
        break;
      case 'complexity':
        complexity = computeComplexity(store, { weights: opts.weights });
        break;
    }

    logger.debug(`Pass "${pass}" finished`, { nodes: store.size, created: store.size - before });
  }

  for (const report of reports) {
    const skipped = Object.entries(report.skipped).filter(([, count]) => count > 0);
    if (skipped.length > 0) {
      logger.warn(`Pass "${report.pass}" skipped elements`, Object.fromEntries(skipped));
    }
  }

  return complexity ? { store, reports, complexity } : { store, reports };
}
