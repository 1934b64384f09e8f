import fs from 'node:fs/promises';
import path from 'node:path';
import { SegmentationFailure, errorMessage } from './errors';
import { logger } from './logger';
import { expectedGofCount, gofFrameCounts } from './plan';
import { INIT_FILE, SegmentTree, TrackPayload, discardSegmentTree, segmentFileName, writeSegmentTree } from './segmentTree';
import { ContainerLayout, GofPlan, SegmentEntry, SegmentIndex, TrackIndex, TrackName } from './types';
import {
  COMPONENT_ORDER,
  SampleStream,
  V3C_PVD,
  V3cUnit,
  componentOf,
  distinctUnits,
  isParameterSet,
  parseSampleStream,
  writeSampleStream,
} from './v3c';

export type SegmentOptions = {
  gofPlan: GofPlan;
  splitComponents: boolean;
  // Frames the tile was encoded with; when omitted every GoF counts encoderGof frames
  frameCount?: number;
  identity?: string;
};

type Gof = {
  parameterSet: V3cUnit; // the VPS opening the GoF
  units: V3cUnit[];
};

// Packed video cannot be separated into components, so it always yields a combined tree
export function resolveLayout(units: readonly V3cUnit[], splitComponents: boolean): ContainerLayout {
  if (!splitComponents || units.some((u) => u.type === V3C_PVD)) {
    return { kind: 'combined' };
  }
  const present = new Set(units.map((u) => componentOf(u.type)));
  return { kind: 'split', components: COMPONENT_ORDER.filter((c) => present.has(c)) };
}

function splitIntoGofs(units: readonly V3cUnit[], fail: (msg: string) => never): Gof[] {
  const gofs: Gof[] = [];
  for (const unit of units) {
    if (isParameterSet(unit)) {
      gofs.push({ parameterSet: unit, units: [] });
      continue;
    }
    const current = gofs[gofs.length - 1];
    if (!current) fail(`unit of type ${unit.type} precedes the first parameter set`);
    current.units.push(unit);
  }
  if (gofs.length === 0) fail('container holds no parameter set');
  return gofs;
}

/**
 * Splits one encoded container into GoF-aligned segments.
 *
 * Every track gets the same init (the distinct parameter sets) and the same
 * segment timing, so the split tree can later be multiplexed back without
 * reparsing GoF boundaries.
 */
export function segmentContainer(input: Buffer | SampleStream, options: SegmentOptions): SegmentTree {
  const identity = options.identity ?? 'unknown';
  const fail = (msg: string): never => {
    throw new SegmentationFailure(identity, msg);
  };

  let container: SampleStream;
  try {
    container = Buffer.isBuffer(input) ? parseSampleStream(input) : input;
  } catch (err) {
    throw new SegmentationFailure(identity, `unparsable container: ${errorMessage(err)}`, { cause: err });
  }

  // 1) GoF boundaries: a new GoF starts at every VPS
  const { gofPlan } = options;
  const gofs = splitIntoGofs(container.units, fail);

  // 2) Frames per GoF; the encoder must have produced exactly the GoFs the frame count needs
  let frames: number[];
  if (options.frameCount !== undefined) {
    const expected = expectedGofCount(options.frameCount, gofPlan.encoderGof);
    if (gofs.length !== expected) {
      fail(
        `container holds ${gofs.length} GoF(s) but ${options.frameCount} frames at GoF ${gofPlan.encoderGof} need ${expected}`,
      );
    }
    frames = gofFrameCounts(options.frameCount, gofPlan.encoderGof);
  } else {
    frames = gofs.map(() => gofPlan.encoderGof);
  }

  // 3) Tracks: one per component present, or a single combined one
  const layout = resolveLayout(container.units, options.splitComponents);
  const trackNames: TrackName[] = layout.kind === 'combined' ? ['combined'] : layout.components;
  if (trackNames.length === 0) fail('container holds no component units');

  // Units of each track, GoF by GoF
  const perTrack = new Map<TrackName, V3cUnit[][]>();
  for (const name of trackNames) {
    perTrack.set(
      name,
      gofs.map((gof, g) => {
        const units = name === 'combined' ? gof.units : gof.units.filter((u) => componentOf(u.type) === name);
        if (units.length === 0) fail(`GoF ${g} carries no ${name} units`);
        return units;
      }),
    );
  }

  // 4) Init: each distinct VPS once, in first-seen order; GoFs refer to it by position
  const initUnits = distinctUnits(gofs.map((g) => g.parameterSet));
  const init = writeSampleStream(container.header, initUnits);
  const parameterSetOf = gofs.map((g) => initUnits.findIndex((u) => u.payload.equals(g.parameterSet.payload)));

  // 5) Segments of gofsPerSegment GoFs; the last one may be shorter
  const tracks: TrackIndex[] = [];
  const payloads: TrackPayload[] = [];
  for (const name of trackNames) {
    const unitsByGof = perTrack.get(name) ?? [];
    const entries: SegmentEntry[] = [];
    const segments: Buffer[] = [];
    let startFrame = 0;

    for (let first = 0; first < gofs.length; first += gofPlan.gofsPerSegment) {
      const last = first + gofPlan.gofsPerSegment;
      const span = unitsByGof.slice(first, last);
      const frameCount = frames.slice(first, last).reduce((a, b) => a + b, 0);
      const data = writeSampleStream(container.header, span.flat());
      const index = entries.length + 1;
      entries.push({
        index,
        file: segmentFileName(index),
        bytes: data.length,
        frameCount,
        startFrame,
        gofCount: span.length,
        gofUnitCounts: span.map((units) => units.length),
        gofParameterSets: parameterSetOf.slice(first, last),
      });
      segments.push(data);
      startFrame += frameCount;
    }

    tracks.push({ name, init: { file: INIT_FILE, bytes: init.length }, segments: entries });
    payloads.push({ name, init, segments });
  }

  const index: SegmentIndex = {
    identity,
    layout: layout.kind,
    gofPlan,
    frameCount: frames.reduce((a, b) => a + b, 0),
    sampleStreamHeader: container.header,
    tracks,
  };
  return { index, payloads };
}

// Reads one succeeded job's container and writes <outDir>/<track>/{init,segment_NNNN}.bin.
// Any failure leaves no tree behind for this identity.
export async function segmentFile(containerPath: string, outDir: string, options: SegmentOptions): Promise<SegmentIndex> {
  const identity = options.identity ?? path.basename(outDir);
  const log = logger.child({ identity });
  try {
    const bytes = await fs.readFile(containerPath);
    const tree = segmentContainer(bytes, { ...options, identity });
    await writeSegmentTree(outDir, tree);
    log.info(
      {
        layout: tree.index.layout,
        tracks: tree.index.tracks.map((t) => t.name),
        segments: tree.index.tracks[0]?.segments.length ?? 0,
        frames: tree.index.frameCount,
        outDir,
      },
      'Segmented bitstream',
    );
    return tree.index;
  } catch (err) {
    await discardSegmentTree(outDir);
    if (err instanceof SegmentationFailure) throw err;
    throw new SegmentationFailure(identity, errorMessage(err), { cause: err });
  }
}
