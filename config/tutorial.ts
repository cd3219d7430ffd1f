import { z } from 'zod';

export const SPEECH_VOICES = [
  'alloy',
  'ash',
  'ballad',
  'coral',
  'echo',
  'fable',
  'onyx',
  'nova',
  'sage',
  'shimmer',
  'verse'
] as const;

export type SpeechVoice = (typeof SPEECH_VOICES)[number];

const intFromEnv = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

export const TutorialConfigSchema = z.object({
  outputDir: z.string().min(1).default('tutorial_data'),
  kernel: z.string().min(1).default('python3'),
  models: z.object({
    generation: z.string().min(1).default('gpt-4o'),
    tts: z.string().min(1).default('gpt-4o-mini-tts'),
    voice: z.enum(SPEECH_VOICES).default('alloy')
  }),
  typing: z.object({
    mode: z.enum(['char', 'line']).default('char'),
    baseDelayMs: intFromEnv(100, 1),
    jitterMs: intFromEnv(40),
    seed: intFromEnv(7)
  }),
  maxSegmentAttempts: intFromEnv(3, 1),
  maxSegments: intFromEnv(12, 1),
  executionTimeoutMs: intFromEnv(60_000, 1000),
  tailPaddingMs: intFromEnv(1500),
  startupDelayMs: intFromEnv(6000),
  idlePollMs: intFromEnv(500, 50),
  plotHoldMs: intFromEnv(3000),
  fps: intFromEnv(20, 1)
});

export type TutorialConfig = z.infer<typeof TutorialConfigSchema>;

type Env = Record<string, string | undefined>;

const pick = (env: Env, key: string) => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

export function loadTutorialConfig(env: Env = process.env): TutorialConfig {
  const parsed = TutorialConfigSchema.safeParse({
    outputDir: pick(env, 'TUTORIAL_OUTPUT_DIR'),
    kernel: pick(env, 'TUTORIAL_KERNEL'),
    models: {
      generation: pick(env, 'OPENAI_MODEL'),
      tts: pick(env, 'OPENAI_TTS_MODEL'),
      voice: pick(env, 'OPENAI_TTS_VOICE')
    },
    typing: {
      mode: pick(env, 'TUTORIAL_TYPING_MODE'),
      baseDelayMs: pick(env, 'TUTORIAL_CHAR_DELAY_MS'),
      jitterMs: pick(env, 'TUTORIAL_CHAR_JITTER_MS'),
      seed: pick(env, 'TUTORIAL_TYPING_SEED')
    },
    maxSegmentAttempts: pick(env, 'TUTORIAL_MAX_ATTEMPTS'),
    maxSegments: pick(env, 'TUTORIAL_MAX_SEGMENTS'),
    executionTimeoutMs: pick(env, 'TUTORIAL_EXEC_TIMEOUT_MS'),
    tailPaddingMs: pick(env, 'TUTORIAL_TAIL_PADDING_MS'),
    startupDelayMs: pick(env, 'TUTORIAL_STARTUP_DELAY_MS'),
    idlePollMs: pick(env, 'TUTORIAL_IDLE_POLL_MS'),
    plotHoldMs: pick(env, 'TUTORIAL_PLOT_HOLD_MS'),
    fps: pick(env, 'TUTORIAL_FPS')
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid tutorial configuration: ${issues}`);
  }
  return parsed.data;
}
