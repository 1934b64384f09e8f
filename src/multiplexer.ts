import fs from 'node:fs/promises';
import path from 'node:path';
import { MultiplexMismatch, errorMessage } from './errors';
import { logger } from './logger';
import {
  INIT_FILE,
  SegmentTree,
  discardSegmentTree,
  readSegmentIndex,
  segmentFileName,
  writeSegmentTree,
} from './segmentTree';
import { ComponentName, SegmentEntry, SegmentIndex, TrackIndex } from './types';
import { COMPONENT_ORDER, V3cUnit, distinctUnits, isParameterSet, parseSampleStream, writeSampleStream } from './v3c';

export type SplitTrack = {
  name: ComponentName;
  entry: TrackIndex;
  initUnits: V3cUnit[];
  segments: V3cUnit[][]; // units of segment i at position i - 1
};

export type SplitTree = {
  index: SegmentIndex;
  tracks: SplitTrack[]; // in component order
};

const SEGMENT_FILE = /^segment_(\d{4,})\.bin$/;

function sameTiming(a: SegmentEntry, b: SegmentEntry): boolean {
  return (
    a.frameCount === b.frameCount &&
    a.startFrame === b.startFrame &&
    a.gofCount === b.gofCount
  );
}

function sameUnits(a: readonly V3cUnit[], b: readonly V3cUnit[]): boolean {
  return a.length === b.length && a.every((u, i) => u.payload.equals(b[i].payload));
}

// Loads and cross-checks a split tree; any disagreement between components is a MultiplexMismatch
export async function readSegmentTree(inputDir: string): Promise<SplitTree> {
  const fallbackIdentity = path.basename(inputDir);
  const mismatch = (msg: string): never => {
    throw new MultiplexMismatch(fallbackIdentity, msg);
  };

  let index: SegmentIndex;
  try {
    index = await readSegmentIndex(inputDir);
  } catch (err) {
    throw new MultiplexMismatch(fallbackIdentity, `unreadable segment index: ${errorMessage(err)}`, { cause: err });
  }
  if (index.layout !== 'split') mismatch('tree is already combined');

  const tracks: SplitTrack[] = [];
  for (const name of COMPONENT_ORDER) {
    const entry = index.tracks.find((t) => t.name === name);
    if (!entry) mismatch(`component ${name} is missing from the segment index`);
    else tracks.push(await readTrack(inputDir, name, entry, mismatch));
  }

  // Every component must share the atlas init and segment timing
  const [atlas] = tracks;
  const reference = atlas.entry.segments;
  for (const track of tracks.slice(1)) {
    if (!sameUnits(track.initUnits, atlas.initUnits)) {
      mismatch(`${track.name}/${INIT_FILE} differs from atlas/${INIT_FILE}`);
    }
    if (track.entry.segments.length !== reference.length) {
      mismatch(`${track.name} has ${track.entry.segments.length} segment(s), atlas has ${reference.length}`);
    }
    track.entry.segments.forEach((seg, i) => {
      if (!sameTiming(seg, reference[i])) {
        mismatch(`${track.name} segment ${seg.index} covers ${seg.frameCount} frame(s), atlas covers ${reference[i].frameCount}`);
      }
      if (seg.gofParameterSets.join() !== reference[i].gofParameterSets.join()) {
        mismatch(`${track.name} segment ${seg.index} uses parameter sets [${seg.gofParameterSets}], atlas uses [${reference[i].gofParameterSets}]`);
      }
    });
  }

  return { index, tracks };
}

async function readTrack(
  inputDir: string,
  name: ComponentName,
  entry: TrackIndex,
  mismatch: (msg: string) => never,
): Promise<SplitTrack> {
  const dir = path.join(inputDir, name);
  let files: string[];
  try {
    files = await fs.readdir(dir);
  } catch {
    return mismatch(`component directory ${name}/ is missing`);
  }

  const onDisk = files
    .map((f) => SEGMENT_FILE.exec(f))
    .filter((m): m is RegExpExecArray => m !== null)
    .map((m) => parseInt(m[1], 10))
    .sort((a, b) => a - b);
  onDisk.forEach((n, i) => {
    if (n !== i + 1) mismatch(`${name}/ segment numbering has a gap before ${segmentFileName(n)}`);
  });
  if (onDisk.length !== entry.segments.length) {
    mismatch(`${name}/ holds ${onDisk.length} segment file(s), index lists ${entry.segments.length}`);
  }
  if (!files.includes(INIT_FILE)) mismatch(`${name}/${INIT_FILE} is missing`);

  const read = async (file: string): Promise<V3cUnit[]> => {
    try {
      return parseSampleStream(await fs.readFile(path.join(dir, file))).units;
    } catch (err) {
      return mismatch(`${name}/${file} is unreadable: ${errorMessage(err)}`);
    }
  };

  const initUnits = await read(INIT_FILE);
  const segments: V3cUnit[][] = [];
  for (const seg of entry.segments) {
    const units = await read(seg.file);
    const expected = seg.gofUnitCounts.reduce((a, b) => a + b, 0);
    if (units.length !== expected || seg.gofUnitCounts.length !== seg.gofCount) {
      mismatch(`${name}/${seg.file} holds ${units.length} unit(s), index expects ${expected}`);
    }
    if (seg.gofParameterSets.length !== seg.gofCount || seg.gofParameterSets.some((p) => p >= initUnits.length)) {
      mismatch(`${name}/${seg.file} refers to a parameter set ${INIT_FILE} does not hold`);
    }
    segments.push(units);
  }
  return { name, entry, initUnits, segments };
}

// Segment i of the result interleaves, GoF by GoF, the units of segment i of every component
export function multiplexSegments(tree: SplitTree): SegmentTree {
  const header = tree.index.sampleStreamHeader;
  const reference = tree.tracks[0].entry.segments;

  // Components share one init, so the per-GoF parameter set positions carry over unchanged
  const initUnits = distinctUnits(tree.tracks.flatMap((t) => t.initUnits.filter(isParameterSet)));
  const init = writeSampleStream(header, initUnits);

  const segments: Buffer[] = [];
  const entries: SegmentEntry[] = reference.map((ref, i) => {
    // Cursor into each component's units for this segment
    const cursors = tree.tracks.map(() => 0);
    const combined: V3cUnit[] = [];
    const gofUnitCounts: number[] = [];
    for (let g = 0; g < ref.gofCount; g++) {
      let count = 0;
      tree.tracks.forEach((track, t) => {
        const n = track.entry.segments[i].gofUnitCounts[g];
        combined.push(...track.segments[i].slice(cursors[t], cursors[t] + n));
        cursors[t] += n;
        count += n;
      });
      gofUnitCounts.push(count);
    }

    const data = writeSampleStream(header, combined);
    segments.push(data);
    return { ...ref, file: segmentFileName(ref.index), bytes: data.length, gofUnitCounts };
  });

  return {
    index: {
      ...tree.index,
      layout: 'combined',
      tracks: [{ name: 'combined', init: { file: INIT_FILE, bytes: init.length }, segments: entries }],
    },
    payloads: [{ name: 'combined', init, segments }],
  };
}

export async function multiplexDirectory(inputDir: string, outputDir: string): Promise<SegmentIndex> {
  const identity = path.basename(inputDir);
  const log = logger.child({ identity });
  try {
    const tree = await readSegmentTree(inputDir);
    const combined = multiplexSegments(tree);
    await writeSegmentTree(outputDir, combined);
    log.info({ segments: combined.index.tracks[0].segments.length, outputDir }, 'Multiplexed segments');
    return combined.index;
  } catch (err) {
    await discardSegmentTree(outputDir);
    if (err instanceof MultiplexMismatch) throw err;
    throw new MultiplexMismatch(identity, errorMessage(err), { cause: err });
  }
}
