import type { Segment, Transcript } from '@/types/tutorial';
import { GenerationFailure, errorMessage, isTutorialError } from '@/lib/tutorial/errors';

export const END_OF_TOPIC = Symbol('end-of-topic');
export type EndOfTopic = typeof END_OF_TOPIC;

export type ProposalRequest = {
  topic: string;
  index: number;
  transcript: Transcript;
  /** Reviewer notes and execution errors collected for this index, oldest first. */
  feedback: readonly string[];
};

export type ProposedSegment = {
  code: string;
  explanation: string;
};

export interface GenerationCapability {
  propose(request: ProposalRequest, signal?: AbortSignal): Promise<ProposedSegment | EndOfTopic>;
}

/**
 * Fenced code blocks in order of appearance. Models occasionally answer in
 * markdown; the first block is then taken as the snippet.
 */
export function extractCodeBlocks(text: string): { lang: string | null; code: string }[] {
  const blocks: { lang: string | null; code: string }[] = [];
  const fence = /```([\w+-]+)?[^\n]*\n([\s\S]*?)```/g;
  let match: RegExpExecArray | null;
  while ((match = fence.exec(text)) !== null) {
    const code = match[2].trim();
    if (code) blocks.push({ lang: match[1] ?? null, code });
  }
  return blocks;
}

function normalizeCode(code: string): string {
  const unfenced = code.includes('```') ? extractCodeBlocks(code)[0]?.code ?? '' : code;
  return unfenced
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+$/gm, '')
    .replace(/^\n+|\n+$/g, '');
}

export class SegmentGenerator {
  constructor(private readonly capability: GenerationCapability) {}

  async next(request: ProposalRequest, signal?: AbortSignal): Promise<Segment | EndOfTopic> {
    let proposal: ProposedSegment | EndOfTopic;
    try {
      proposal = await this.capability.propose(request, signal);
    } catch (err) {
      if (signal?.aborted || isTutorialError(err, 'EXECUTION_ERROR') || isTutorialError(err, 'GENERATION_FAILURE')) throw err;
      throw new GenerationFailure(`Generation failed for segment ${request.index}: ${errorMessage(err)}`, {
        cause: err
      });
    }
    signal?.throwIfAborted();
    if (proposal === END_OF_TOPIC) return END_OF_TOPIC;

    const code = normalizeCode(proposal.code);
    if (!code) {
      throw new GenerationFailure(`Generation returned no code for segment ${request.index}`);
    }
    return {
      index: request.index,
      code,
      explanation: proposal.explanation.replace(/\s+/g, ' ').trim(),
      status: 'proposed'
    };
  }
}
