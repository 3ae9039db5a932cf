// Types for the in-memory recording the sidecar merges write into

export interface Position3D {
  x: number;
  y: number;
  z: number;
}

export interface Channel {
  label: string;
  position?: Position3D;
  // EEG, EOG, FID, etc.
  type: string;
  isDataChannel: boolean;
}

export interface RecordingEvent {
  // Sample index of the event onset
  latency: number;
  type: string;
  duration?: number;
}

export interface IcaDecomposition {
  // components x channels used
  weights: number[][];
  // channels used x channels used
  sphering: number[][];
  // Indices into Recording.channels the decomposition was computed over
  channelIndices: number[];
}

export interface TimeMark {
  label: string;
  // One entry per sample, or per component for component-domain marks
  flags: boolean[];
}

export interface MarkSet {
  // Category key (e.g. "chan_bad") to the channel entries flagged under it
  discreteChannelMarks: Map<string, Set<string>>;
  discreteComponentMarks: Map<string, Set<string>>;
  timeInfo: TimeMark[];
}

export interface Recording {
  filePath: string;
  sampleRate: number;
  sampleCount: number;
  channels: Channel[];
  // Fiducials and other position-only points
  nonDataChannels: Channel[];
  events: RecordingEvent[];
  ica?: IcaDecomposition;
  marks?: MarkSet;
}
