export type SegmentStatus = 'proposed' | 'approved' | 'rejected' | 'executed';

export type Segment = {
  index: number;
  code: string;
  explanation: string;
  status: SegmentStatus;
};

export type ExecutedSegment = Readonly<Segment & { status: 'executed' }>;

/** Approved-and-executed history handed to generation as context. */
export type Transcript = readonly ExecutedSegment[];

export type NarrationMode = 'parallel' | 'after';
export type ApprovalPolicy = 'manual' | 'force-approve';

export type NarrationClip = {
  segmentIndex: number;
  audioPath: string;
  durationSec: number;
  startOffsetSec: number;
};

export type CaptureInterval = {
  segmentIndex: number;
  filePath: string;
  startOffsetSec: number;
  endOffsetSec: number;
};

export type TutorialRun = {
  topic: string;
  narrationMode: NarrationMode;
  approvalPolicy: ApprovalPolicy;
  segments: Segment[];
  intervals: CaptureInterval[];
  clips: NarrationClip[];
  degradedSegments: number[];
};

export type TutorialState =
  | 'idle'
  | 'generating'
  | 'awaiting-approval'
  | 'capturing'
  | 'narrating'
  | 'sealing'
  | 'done'
  | 'aborted'
  | 'failed';

export type Verdict =
  | { kind: 'accept' }
  | { kind: 'reject'; feedback: string }
  | { kind: 'abort'; reason: string };

export type TutorialOutcome =
  | { status: 'done'; run: TutorialRun }
  | { status: 'aborted'; reason: string; run: TutorialRun };

export type ResourceHint = {
  path: string;
  purpose: string;
};

export type TimelineEntry = {
  segmentIndex: number;
  interval: CaptureInterval;
  clip: NarrationClip | null;
  startSec: number;
  endSec: number;
  /** Seconds the last frame is held after the interval footage ends. */
  holdSec: number;
  /** Narration start relative to the entry start. */
  audioDelaySec: number;
  caption: string;
};

export type TutorialTimeline = {
  topic: string;
  narrationMode: NarrationMode;
  entries: TimelineEntry[];
  totalSec: number;
  degraded: boolean;
};

export type TutorialManifest = {
  id: string;
  topic: string;
  kernel: string;
  narrationMode: NarrationMode;
  approvalPolicy: ApprovalPolicy;
  segments: { index: number; code: string; explanation: string }[];
  timeline: TutorialTimeline;
  captions?: { srt?: string; vtt?: string };
  video?: string;
  createdAt: string;
  version: number;
};
