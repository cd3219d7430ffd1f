import { join } from 'node:path';
import type { TutorialConfig } from '@/config/tutorial';
import { resolveKernelProfile, type KernelProfile } from '@/config/kernels';
import type { ApprovalPolicy, NarrationMode, ResourceHint, TutorialOutcome, TutorialRun } from '@/types/tutorial';
import { createLogger } from '@/lib/log';
import { X11Desktop } from '@/lib/desktop/x11';
import { TerminalConsoleSession } from '@/lib/desktop/terminalSession';
import { assembleTutorial } from '@/lib/media/assemble';
import { FfplayAudioPlayer } from '@/lib/media/player';
import { FfmpegScreenRecorder } from '@/lib/media/recorder';
import { OpenAISpeechSynthesizer } from '@/lib/speech/openaiSpeech';
import { ApprovalGate, ConsoleDecisionSource, type DecisionSource } from '@/lib/tutorial/approval';
import { buildCaptions } from '@/lib/tutorial/captions';
import { CaptureController } from '@/lib/tutorial/capture';
import { SegmentGenerator } from '@/lib/tutorial/generator';
import { buildManifest, tutorialId, writeCaptions, writeManifest } from '@/lib/tutorial/manifest';
import { NarrationRecorder } from '@/lib/tutorial/narration';
import { OpenAISegmentSource } from '@/lib/tutorial/openaiSegments';
import { TutorialOrchestrator } from '@/lib/tutorial/orchestrator';
import { buildTimeline } from '@/lib/tutorial/timeline';
import { DEFAULT_DELAY_PROFILE, TypingSimulator } from '@/lib/tutorial/typing';

const log = createLogger('tutorial');

export type TutorialRequest = {
  topic: string;
  narrationMode: NarrationMode;
  approvalPolicy: ApprovalPolicy;
  kernel?: string;
  resources?: ResourceHint[];
  maxSegments?: number;
};

export type FinalizeResult = {
  manifestPath: string;
  video: { ok: true; path: string } | { ok: false; reason: string };
};

export type TutorialResult = {
  id: string;
  dir: string;
  outcome: TutorialOutcome;
  artifacts: FinalizeResult | null;
};

type Assembler = typeof assembleTutorial;

/** Validates the run, then writes captions, the assembled video and the manifest. */
export async function finalizeTutorial(args: {
  id: string;
  dir: string;
  kernel: string;
  fps: number;
  run: TutorialRun;
  assemble?: Assembler;
}): Promise<FinalizeResult> {
  const timeline = buildTimeline(args.run);
  const captions = buildCaptions(timeline);
  const captionPaths = await writeCaptions(args.dir, captions);
  const assemble = args.assemble ?? assembleTutorial;
  const video = await assemble(timeline, join(args.dir, 'tutorial.mp4'), { fps: args.fps });
  if (!video.ok) log.warn(`assembly skipped: ${video.reason}`);

  const manifest = buildManifest({
    id: args.id,
    kernel: args.kernel,
    run: args.run,
    timeline,
    captions: captionPaths,
    video: video.ok ? video.path : undefined
  });
  const manifestPath = await writeManifest(args.dir, manifest);
  log.info(`manifest written to ${manifestPath}${timeline.degraded ? ' (degraded)' : ''}`);
  return { manifestPath, video };
}

function typingProfile(config: TutorialConfig) {
  return { ...DEFAULT_DELAY_PROFILE, baseMs: config.typing.baseDelayMs, jitterMs: config.typing.jitterMs };
}

/**
 * Runs one tutorial end to end against the real desktop: console window,
 * screen recorder, OpenAI generation and speech.
 */
export async function makeTutorial(
  request: TutorialRequest,
  config: TutorialConfig,
  hooks: { decisions?: DecisionSource; onStart?: (orchestrator: TutorialOrchestrator) => void } = {}
): Promise<TutorialResult> {
  const profile: KernelProfile = resolveKernelProfile(request.kernel ?? config.kernel);
  const id = tutorialId(request.topic, profile.kernel, new Date());
  const dir = join(config.outputDir, id);
  log.info(`tutorial ${id}: "${request.topic}" kernel=${profile.kernel} narration=${request.narrationMode}`);

  const desktop = new X11Desktop();
  const session = new TerminalConsoleSession({
    profile,
    desktop,
    logPath: join(dir, 'console.log'),
    windowTitle: `tutorial-${id}`,
    startupDelayMs: config.startupDelayMs,
    idlePollMs: config.idlePollMs,
    plotHoldMs: config.plotHoldMs
  });
  // Opens stdin only when a manual review actually asks.
  const consoleSource = new ConsoleDecisionSource();
  const decisions = hooks.decisions ?? consoleSource;

  const maxSegments = request.maxSegments ?? config.maxSegments;
  const orchestrator = new TutorialOrchestrator(
    {
      generator: new SegmentGenerator(
        new OpenAISegmentSource({
          profile,
          resources: request.resources,
          maxSegments,
          model: config.models.generation
        })
      ),
      gate: new ApprovalGate(decisions, profile.fence),
      typist: new TypingSimulator({
        mode: config.typing.mode,
        seed: config.typing.seed,
        autoIndent: profile.autoIndent,
        indentWidth: profile.indentWidth,
        profile: typingProfile(config)
      }),
      session,
      capture: new CaptureController(
        new FfmpegScreenRecorder({
          display: process.env.DISPLAY || ':0',
          fps: config.fps,
          region: () => session.region()
        }),
        { outputDir: join(dir, 'recordings') }
      ),
      narration: new NarrationRecorder(
        new OpenAISpeechSynthesizer({ outDir: join(dir, 'audio'), model: config.models.tts, voice: config.models.voice }),
        new FfplayAudioPlayer()
      )
    },
    {
      topic: request.topic,
      narrationMode: request.narrationMode,
      approvalPolicy: request.approvalPolicy,
      maxSegments,
      maxSegmentAttempts: config.maxSegmentAttempts,
      executionTimeoutMs: config.executionTimeoutMs,
      tailPaddingMs: config.tailPaddingMs
    }
  );
  hooks.onStart?.(orchestrator);

  let outcome: TutorialOutcome;
  try {
    await session.start();
    outcome = await orchestrator.start();
  } finally {
    await session.close();
    consoleSource.close();
  }

  if (outcome.status === 'aborted') {
    log.warn(`aborted: ${outcome.reason}`);
    return { id, dir, outcome, artifacts: null };
  }
  const artifacts = await finalizeTutorial({ id, dir, kernel: profile.kernel, fps: config.fps, run: outcome.run });
  return { id, dir, outcome, artifacts };
}
