import { describe, it, expect, beforeEach, vi } from 'vitest';
import { resolveKernelProfile } from '@/config/kernels';
import type { ExecutedSegment } from '@/types/tutorial';

vi.mock('@/lib/openai-client', () => ({
  callJson: vi.fn()
}));

const { callJson } = await import('@/lib/openai-client');
const { OpenAISegmentSource, renderTranscript } = await import('@/lib/tutorial/openaiSegments');
const { END_OF_TOPIC } = await import('@/lib/tutorial/generator');

const executed = (index: number, code: string): ExecutedSegment => ({
  index,
  code,
  explanation: `Step ${index}`,
  status: 'executed'
});

describe('renderTranscript', () => {
  it('marks an empty history', () => {
    expect(renderTranscript([], 'python')).toBe('[none yet]');
  });

  it('numbers executed snippets in fenced blocks', () => {
    expect(renderTranscript([executed(0, 'import math'), executed(1, 'math.pi')], 'python')).toBe(
      '#1\n```python\nimport math\n```\n\n#2\n```python\nmath.pi\n```'
    );
  });

  it('keeps the most recent snippets when the history is too long', () => {
    const big = 'x'.repeat(7000);
    const rendered = renderTranscript([executed(0, big), executed(1, big), executed(2, 'done()')], 'python');
    expect(rendered.startsWith('#2\n')).toBe(true);
    expect(rendered.endsWith('#3\n```python\ndone()\n```')).toBe(true);
  });
});

describe('OpenAISegmentSource', () => {
  const profile = resolveKernelProfile('python3');

  beforeEach(() => {
    vi.mocked(callJson).mockReset();
  });

  it('fills the user prompt with topic, history, resources and feedback', () => {
    const source = new OpenAISegmentSource({
      profile,
      maxSegments: 5,
      resources: [{ path: '/data/sales.csv', purpose: 'monthly sales figures' }]
    });

    const prompt = source.buildUserPrompt({
      topic: 'Pandas basics',
      index: 1,
      transcript: [executed(0, 'import pandas as pd')],
      feedback: ['Use read_csv']
    });

    expect(prompt).toContain('Topic: Pandas basics');
    expect(prompt).toContain('Snippet number: 2 (at most 5 in total)');
    expect(prompt).toContain('- Path: /data/sales.csv, Purpose: monthly sales figures');
    expect(prompt).toContain('#1\n```python\nimport pandas as pd\n```');
    expect(prompt).toContain('- Use read_csv');
    expect(prompt).not.toContain('{{');
  });

  it('returns the proposed snippet', async () => {
    vi.mocked(callJson).mockResolvedValue({ done: false, code: 'df = pd.DataFrame()', explanation: 'Create an empty frame.' });
    const source = new OpenAISegmentSource({ profile, maxSegments: 5, model: 'gpt-test' });

    const result = await source.propose({ topic: 'Pandas basics', index: 0, transcript: [], feedback: [] });

    expect(result).toEqual({ code: 'df = pd.DataFrame()', explanation: 'Create an empty frame.' });
    expect(vi.mocked(callJson)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(callJson).mock.calls[0][0]).toMatchObject({
      agent: 'SegmentGenerator',
      model: 'gpt-test',
      schema: { name: 'TutorialSegment' }
    });
    expect(vi.mocked(callJson).mock.calls[0][0].system).toContain('interactive Python console (python3 kernel)');
  });

  it('ends the topic when the model reports done without code', async () => {
    vi.mocked(callJson).mockResolvedValue({ done: true, code: '', explanation: '' });
    const source = new OpenAISegmentSource({ profile, maxSegments: 5 });

    expect(await source.propose({ topic: 'Pandas basics', index: 4, transcript: [], feedback: [] })).toBe(END_OF_TOPIC);
  });
});
