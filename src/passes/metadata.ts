import type { Score, KeySignature } from '../types';
import { setRef } from '../graph/store';
import type { NodeStore } from '../graph/store';
import { Prop } from '../graph/vocabulary';
import type { KeyMode, KeySignatureClass, NodeType } from '../graph/vocabulary';
import { globalKeyId, globalKeySignatureId, instrumentId, workNodeId } from '../id';
import { getPrimaryPart } from '../query';
import { createPassReport } from '../diagnostics';
import type { PassReport } from '../diagnostics';

// ============================================================
// Key inference
// ============================================================

/** Global key of a work as a position on the circle of fifths */
export interface KeyEstimate {
  fifths?: number;
  mode?: string;
}

/** Source of the work's global key; an analyzer can stand in for the default. */
export interface KeyInference {
  infer(score: Score): KeyEstimate;
}

/** The first `<key>` of the first part, mid-measure attribute changes included */
export const firstKeySignature: KeyInference = {
  infer(score) {
    const part = getPrimaryPart(score);
    for (const measure of part?.measures ?? []) {
      const blocks: (KeySignature | undefined)[] = [
        measure.attributes?.key,
        ...measure.entries.map((entry) => (entry.type === 'attributes' ? entry.attributes.key : undefined)),
      ];
      const key = blocks.find((block) => block !== undefined);
      if (key) return { fifths: key.fifths, mode: key.mode };
    }
    return {};
  },
};

const MAJOR_TONICS = new Map<number, string>([
  [-7, 'C_flat'], [-6, 'G_flat'], [-5, 'D_flat'], [-4, 'A_flat'],
  [-3, 'E_flat'], [-2, 'B_flat'], [-1, 'F'], [0, 'C'],
  [1, 'G'], [2, 'D'], [3, 'A'], [4, 'E'], [5, 'B'],
  [6, 'F_sharp'], [7, 'C_sharp'],
]);

const MINOR_TONICS = new Map<number, string>([
  [-7, 'A_flat'], [-6, 'E_flat'], [-5, 'B_flat'], [-4, 'F'],
  [-3, 'C'], [-2, 'G'], [-1, 'D'], [0, 'A'],
  [1, 'E'], [2, 'B'], [3, 'F_sharp'], [4, 'C_sharp'],
  [5, 'G_sharp'], [6, 'D_sharp'], [7, 'A_sharp'],
]);

export interface KeyDescription {
  fifths: number;
  mode?: string;
  signatureClass: KeySignatureClass;
  accidentalType: 'none' | 'sharp' | 'flat';
  accidentalCount: number;
  tonic?: string;
}

function isKeyMode(mode: string | undefined): mode is KeyMode {
  return mode === 'major' || mode === 'minor';
}

/** Signature class, accidentals and tonic for a number of fifths and a mode. */
export function describeKey(fifths: number, mode?: string): KeyDescription {
  const normalizedMode = mode?.trim().toLowerCase() || undefined;
  const accidentalCount = Math.abs(fifths);

  let signatureClass: KeySignatureClass;
  let accidentalType: KeyDescription['accidentalType'];
  if (fifths === 0) {
    signatureClass = 'so:KS_0';
    accidentalType = 'none';
  } else if (fifths > 0) {
    signatureClass = `so:KS_${fifths}sharps`;
    accidentalType = 'sharp';
  } else {
    signatureClass = `so:KS_${accidentalCount}flats`;
    accidentalType = 'flat';
  }

  const description: KeyDescription = { fifths, signatureClass, accidentalType, accidentalCount };
  if (normalizedMode !== undefined) description.mode = normalizedMode;
  if (isKeyMode(normalizedMode)) {
    const tonic = (normalizedMode === 'major' ? MAJOR_TONICS : MINOR_TONICS).get(fifths);
    if (tonic !== undefined) description.tonic = tonic;
  }
  return description;
}

// ============================================================
// Title / composer / instrument
// ============================================================

function collapseWhitespace(text: string | undefined): string | undefined {
  const collapsed = text?.split(/\s+/).filter(Boolean).join(' ');
  return collapsed || undefined;
}

function creditWords(score: Score, creditType: string): string | undefined {
  for (const credit of score.metadata.credits ?? []) {
    if (credit.creditType !== creditType) continue;
    const words = collapseWhitespace(credit.words[0]);
    if (words) return words;
  }
  return undefined;
}

export function workTitle(score: Score): string | undefined {
  return (
    collapseWhitespace(score.metadata.workTitle) ??
    collapseWhitespace(score.metadata.movementTitle) ??
    creditWords(score, 'title')
  );
}

export function workComposer(score: Score): string | undefined {
  const creator = score.metadata.creators?.find((c) => c.type === 'composer');
  return collapseWhitespace(creator?.value) ?? creditWords(score, 'composer');
}

/** Part name of the first score part, else its first instrument name, else "Piano". */
export function instrumentLabel(score: Score): string {
  const info = score.partList[0];
  return collapseWhitespace(info?.name) ?? collapseWhitespace(info?.instrumentNames?.[0]) ?? 'Piano';
}

// ============================================================
// Pass
// ============================================================

export interface MetadataOptions {
  workId: string;
  /** File name recorded as `dct:source` */
  sourceName?: string;
  keyInference?: KeyInference;
}

/**
 * Describe the work itself: title, composer, source file, instrument and
 * global key. Needs no measures, so it never raises a structure error.
 */
export function buildMetadata(store: NodeStore, score: Score, options: MetadataOptions): PassReport {
  const report = createPassReport('metadata');
  const work = store.getOrCreate(workNodeId(options.workId), ['mo:MusicalWork', 'so:Sonata', 'so:Metadata']);

  const title = workTitle(score);
  if (title !== undefined) work.properties.set(Prop.title, title);
  const composer = workComposer(score);
  if (composer !== undefined) work.properties.set(Prop.composer, composer);
  if (options.sourceName !== undefined) work.properties.set(Prop.source, options.sourceName);

  const label = instrumentLabel(score);
  const instrumentClass: NodeType = label.toLowerCase().includes('piano') ? 'so:Piano' : 'so:Instrument';
  const instrument = store.getOrCreate(instrumentId(options.workId), [instrumentClass, 'so:Metadata']);
  instrument.properties.set(Prop.label, label);
  setRef(work, Prop.hasInstrument, instrument.id);

  const estimate = (options.keyInference ?? firstKeySignature).infer(score);
  if (estimate.fifths === undefined) return report;

  const key = describeKey(estimate.fifths, estimate.mode);
  const keyTypes: NodeType[] = ['mto:Key', 'so:HarmonicElement'];
  if (key.tonic !== undefined && isKeyMode(key.mode)) {
    keyTypes.push(`so:Key_${key.tonic}_${key.mode}`);
  }
  const keyNode = store.getOrCreate(globalKeyId(options.workId), keyTypes);
  if (key.tonic !== undefined) keyNode.properties.set(Prop.hasTonic, key.tonic);
  if (key.mode !== undefined) keyNode.properties.set(Prop.hasMode, key.mode);

  const signature = store.getOrCreate(globalKeySignatureId(options.workId), [
    'mto:KeySignature',
    'mto:Signature',
    'so:MusicNotationElement',
    key.signatureClass,
  ]);
  signature.properties.set(Prop.accidentalCount, key.accidentalCount);
  signature.properties.set(Prop.accidentalType, key.accidentalType);
  setRef(signature, Prop.representsKey, keyNode.id);

  setRef(work, Prop.hasKey, keyNode.id);
  return report;
}
