import { z } from 'zod';
import { callJson } from '@/lib/openai-client';
import { loadPrompt, renderTemplate } from '@/lib/prompts';
import type { KernelProfile } from '@/config/kernels';
import type { ResourceHint, Transcript } from '@/types/tutorial';
import {
  END_OF_TOPIC,
  type EndOfTopic,
  type GenerationCapability,
  type ProposalRequest,
  type ProposedSegment
} from '@/lib/tutorial/generator';

export const SegmentProposalSchema = z.object({
  done: z.boolean(),
  code: z.string(),
  explanation: z.string()
});

const SegmentProposalJsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    done: { type: 'boolean' },
    code: { type: 'string' },
    explanation: { type: 'string' }
  },
  required: ['done', 'code', 'explanation']
} as const;

const MAX_TRANSCRIPT_CHARS = 12000;

export type OpenAISegmentSourceOptions = {
  profile: KernelProfile;
  resources?: ResourceHint[];
  maxSegments: number;
  model?: string;
  temperature?: number;
};

export function renderTranscript(transcript: Transcript, fence: string): string {
  if (!transcript.length) return '[none yet]';
  const rendered = transcript.map((s) => `#${s.index + 1}\n\`\`\`${fence}\n${s.code}\n\`\`\``);
  // Keep the most recent snippets when the history outgrows the budget.
  const kept: string[] = [];
  let size = 0;
  for (let i = rendered.length - 1; i >= 0; i -= 1) {
    size += rendered[i].length;
    if (size > MAX_TRANSCRIPT_CHARS && kept.length) break;
    kept.unshift(rendered[i]);
  }
  return kept.join('\n\n');
}

function renderList(items: readonly string[], empty: string): string {
  return items.length ? items.map((item) => `- ${item}`).join('\n') : empty;
}

export class OpenAISegmentSource implements GenerationCapability {
  private readonly system: string;

  constructor(private readonly options: OpenAISegmentSourceOptions) {
    this.system = renderTemplate(loadPrompt('segment-generator.system.md'), {
      language: options.profile.label,
      kernel: options.profile.kernel
    });
  }

  buildUserPrompt(request: ProposalRequest): string {
    const { profile, resources = [], maxSegments } = this.options;
    return renderTemplate(loadPrompt('segment-generator.user.md'), {
      topic: request.topic,
      index: String(request.index + 1),
      max_segments: String(maxSegments),
      notes: renderList(profile.notes, '[none]'),
      resources: renderList(
        resources.map((r) => `Path: ${r.path}, Purpose: ${r.purpose}`),
        '[none]'
      ),
      transcript: renderTranscript(request.transcript, profile.fence),
      feedback: renderList(request.feedback, '[none]')
    });
  }

  async propose(request: ProposalRequest, signal?: AbortSignal): Promise<ProposedSegment | EndOfTopic> {
    const result = await callJson({
      system: this.system,
      user: this.buildUserPrompt(request),
      schema: { name: 'TutorialSegment', schema: SegmentProposalJsonSchema },
      temperature: this.options.temperature ?? 0.4,
      model: this.options.model,
      parser: SegmentProposalSchema,
      agent: 'SegmentGenerator',
      signal
    });
    if (result.done && !result.code.trim()) {
      return END_OF_TOPIC;
    }
    return { code: result.code, explanation: result.explanation };
  }
}
