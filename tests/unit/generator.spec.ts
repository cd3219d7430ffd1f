import { describe, it, expect } from 'vitest';
import { END_OF_TOPIC, SegmentGenerator, extractCodeBlocks } from '@/lib/tutorial/generator';
import { ExecutionError, GenerationFailure } from '@/lib/tutorial/errors';
import { ScriptedCapability, segment } from '@/tests/helpers/fakes';

const request = { topic: 'Dictionaries', index: 0, transcript: [], feedback: [] };

describe('extractCodeBlocks', () => {
  it('returns fenced blocks in order with their language tags', () => {
    const text = 'Intro\n```python\nx = {}\n```\nthen\n```\nprint(x)\n```';
    expect(extractCodeBlocks(text)).toEqual([
      { lang: 'python', code: 'x = {}' },
      { lang: null, code: 'print(x)' }
    ]);
  });

  it('skips empty blocks', () => {
    expect(extractCodeBlocks('```python\n\n```')).toEqual([]);
  });
});

describe('SegmentGenerator', () => {
  it('returns a proposed segment with normalised code and narration', async () => {
    const generator = new SegmentGenerator(
      new ScriptedCapability([segment('```python\r\nd = {"a": 1}   \r\nd["b"] = 2\r\n```', '  Build a\n dictionary. ')])
    );

    expect(await generator.next(request)).toEqual({
      index: 0,
      code: 'd = {"a": 1}\nd["b"] = 2',
      explanation: 'Build a dictionary.',
      status: 'proposed'
    });
  });

  it('passes the end of the topic through', async () => {
    const generator = new SegmentGenerator(new ScriptedCapability([END_OF_TOPIC]));

    expect(await generator.next(request)).toBe(END_OF_TOPIC);
  });

  it('treats empty code as a generation failure', async () => {
    const generator = new SegmentGenerator(new ScriptedCapability([segment('   \n')]));

    await expect(generator.next(request)).rejects.toBeInstanceOf(GenerationFailure);
  });

  it('wraps unknown errors and keeps execution errors intact', async () => {
    const wrapped = new SegmentGenerator(new ScriptedCapability([new Error('socket hang up')]));
    await expect(wrapped.next(request)).rejects.toThrow('Generation failed for segment 0: socket hang up');

    const execution = new ExecutionError('kernel died');
    const passthrough = new SegmentGenerator(new ScriptedCapability([execution]));
    await expect(passthrough.next(request)).rejects.toBe(execution);
  });

  it('hands transcript and feedback to the capability', async () => {
    const capability = new ScriptedCapability([segment('d.items()')]);
    const generator = new SegmentGenerator(capability);

    await generator.next({ ...request, index: 3, feedback: ['show the loop too'] });

    expect(capability.requests[0]).toMatchObject({ topic: 'Dictionaries', index: 3, feedback: ['show the loop too'] });
  });
});
