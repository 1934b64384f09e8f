export type QualityTriplet = {
  occ: number; // occupancyMapQP
  geo: number; // geometryQP
  attr: number; // attributeQP
};

export type SpatialBounds = {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
  zmin: number;
  zmax: number;
};

export type Tile = {
  id: number;
  name: string; // tile_<id>
  dir: string; // folder holding the tile's .ply frames
  frameRange: [number, number]; // [start, end)
  frameCount: number;
  framePattern: string; // e.g. longdress_vox10_%04d.ply
  vox: number; // geometry3dCoordinatesBitdepth
  // tiling segment index -> bounds of this tile during that segment
  spatialBounds: Record<string, SpatialBounds>;
};

export type ThreadBudget = {
  parallelism: number;
  threadsPerInstance: number;
  maxConcurrentEncodes: number;
};

export type GofPlan = {
  segmentSize: number; // frames per output segment
  encoderGof: number; // frames per encoder GoF
  gofsPerSegment: number;
};

export type EncodeJobState = 'pending' | 'running' | 'succeeded' | 'failed';

export type EncodeJob = {
  identity: string;
  tile: Tile;
  triplet: QualityTriplet;
  state: EncodeJobState;
  outputPath: string; // final container path, only present once the job succeeded
  reason?: string;
  startedAt?: number;
  finishedAt?: number;
};

export type EncodeOutcome =
  | { status: 'succeeded'; path: string }
  | { status: 'failed'; reason: string };

export type ComponentName = 'atlas' | 'occp' | 'geom' | 'attr';
export type TrackName = ComponentName | 'combined';

export type ContainerLayout =
  | { kind: 'combined' }
  | { kind: 'split'; components: ComponentName[] };

export type InitEntry = {
  file: string;
  bytes: number;
};

export type SegmentEntry = {
  index: number; // 1-based
  file: string;
  bytes: number;
  frameCount: number;
  startFrame: number; // relative to the first frame of the tile
  gofCount: number;
  gofUnitCounts: number[]; // units of this track in each GoF of the segment
  gofParameterSets: number[]; // position in init.bin of the VPS each GoF uses
};

export type TrackIndex = {
  name: TrackName;
  init: InitEntry;
  segments: SegmentEntry[];
};

// segments.json at the root of every identity directory
export type SegmentIndex = {
  identity: string;
  layout: ContainerLayout['kind'];
  gofPlan: GofPlan;
  frameCount: number;
  sampleStreamHeader: number;
  tracks: TrackIndex[];
};

export type Stage = 'config' | 'encode' | 'segment' | 'multiplex';

export type StageFailure = {
  identity: string;
  stage: Exclude<Stage, 'config'>;
  reason: string;
};

export type StageStatus = 'pending' | 'succeeded' | 'failed' | 'skipped';

export type IdentityReport = {
  identity: string;
  tile: Tile;
  triplet: QualityTriplet;
  containerPath: string;
  segmentDir: string;
  muxDir: string;
  encode: StageStatus;
  segment: StageStatus;
  multiplex: StageStatus;
  segmentIndex?: SegmentIndex;
  muxIndex?: SegmentIndex;
};

// run-summary.json
export type RunSummary = {
  project: string;
  startedAt: string;
  finishedAt: string;
  gofPlan: GofPlan;
  budget: ThreadBudget;
  frameRate: number;
  identities: IdentityReport[];
  failures: StageFailure[];
  degraded: boolean;
  cancelled: boolean;
};
