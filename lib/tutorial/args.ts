import { z } from 'zod';

export const TutorialArgsSchema = z.object({
  topic: z.string().trim().min(1, 'a topic is required'),
  narration: z.enum(['parallel', 'after']).default('after'),
  kernel: z.string().trim().min(1).optional(),
  forceApprove: z.boolean().default(false),
  ioPaths: z.array(z.string().min(1)).default([]),
  maxSegments: z.coerce.number().int().min(1).optional()
});

export type TutorialArgs = z.infer<typeof TutorialArgsSchema>;

export const USAGE =
  'Usage: make-tutorial --topic "<topic>" [--narration=after|parallel] [--kernel=python3] ' +
  '[--force-approve] [--io-path <path> ...] [--max-segments=<n>]';

const ALIASES: Record<string, string> = {
  topic: 'topic',
  narration: 'narration',
  'narration-type': 'narration',
  kernel: 'kernel',
  'max-segments': 'maxSegments'
};

/**
 * Accepts `--flag=value` and `--flag value`. `--io-path` takes every value
 * up to the next flag and may be repeated.
 */
export function parseTutorialArgs(argv: readonly string[]): TutorialArgs {
  const raw: Record<string, unknown> = {};
  const ioPaths: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      throw new Error(`Unexpected argument "${arg}"\n${USAGE}`);
    }
    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    if (name === 'force-approve') {
      raw.forceApprove = true;
      continue;
    }
    if (name === 'io-path') {
      if (inline !== undefined) ioPaths.push(inline);
      while (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        i += 1;
        ioPaths.push(argv[i]);
      }
      continue;
    }
    const key = ALIASES[name];
    if (!key) {
      throw new Error(`Unknown option --${name}\n${USAGE}`);
    }
    if (inline !== undefined) {
      raw[key] = inline;
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      i += 1;
      raw[key] = argv[i];
    } else {
      throw new Error(`Option --${name} needs a value\n${USAGE}`);
    }
  }

  const parsed = TutorialArgsSchema.safeParse({ ...raw, ioPaths });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`).join('; ');
    throw new Error(`${issues}\n${USAGE}`);
  }
  return parsed.data;
}
