import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import { z } from 'zod';

const MODEL = process.env.OPENAI_MODEL || 'gpt-4o';
const TIMEOUT_MS = Number(process.env.OPENAI_TIMEOUT_MS ?? '60000');

let client: OpenAI | null = null;

export function getClient(): OpenAI {
  if (!process.env.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY missing');
  }
  if (!client) {
    client = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY,
      timeout: Number.isFinite(TIMEOUT_MS) && TIMEOUT_MS > 0 ? TIMEOUT_MS : 60000,
      maxRetries: 1
    });
  }
  return client;
}

export type JsonSchemaSpec = {
  name: string;
  schema: Record<string, unknown>;
  strict?: boolean;
};

export type JsonCallParams<T> = {
  system: string;
  user: string;
  schema: JsonSchemaSpec;
  temperature?: number;
  model?: string;
  parser: z.ZodType<T>;
  agent?: string;
  signal?: AbortSignal;
};

type UsageLike = { input_tokens?: number; output_tokens?: number } | null | undefined;

function logUsage(agent: string | undefined, model: string, usage: UsageLike) {
  if (!usage) return;
  console.info(
    `[LLM][agent=${agent || 'unknown'}] done tokens in=${usage.input_tokens ?? 'n/a'} out=${usage.output_tokens ?? 'n/a'} model=${model}`
  );
}

function describeApiError(err: unknown): { status?: number; message: string } {
  if (err instanceof OpenAI.APIError) {
    return { status: err.status, message: err.message };
  }
  return { message: err instanceof Error ? err.message : String(err) };
}

export class OpenAICallError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OpenAICallError';
    this.status = status;
  }
}

export function parseJsonLoose(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    try {
      return JSON.parse(jsonrepair(text));
    } catch {
      throw new Error('OpenAI returned non-JSON output');
    }
  }
}

export async function callJson<T>({
  system,
  user,
  schema,
  temperature = 0.2,
  model = MODEL,
  parser,
  agent,
  signal
}: JsonCallParams<T>): Promise<T> {
  const openai = getClient();

  const request = (includeTemperature: boolean) =>
    openai.responses.create({
      model,
      input: [
        { role: 'system', content: system },
        { role: 'user', content: user }
      ],
      ...(includeTemperature ? { temperature } : {}),
      text: {
        format: {
          type: 'json_schema',
          name: schema.name,
          schema: schema.schema,
          strict: schema.strict ?? true
        }
      }
    }, { signal });

  console.info(`[LLM][agent=${agent || 'unknown'}] callJson model=${model} schema=${schema.name}`);
  let res: Awaited<ReturnType<typeof request>>;
  try {
    res = await request(true);
  } catch (err) {
    const { status, message } = describeApiError(err);
    // Some reasoning models reject the temperature parameter; retry once without it.
    if (!/Unsupported parameter: 'temperature'/.test(message)) {
      throw new OpenAICallError(`OpenAI error ${status ?? ''}: ${message}`, status, { cause: err });
    }
    try {
      res = await request(false);
    } catch (err2) {
      const second = describeApiError(err2);
      throw new OpenAICallError(`OpenAI error ${second.status ?? ''}: ${second.message}`, second.status, {
        cause: err2
      });
    }
  }

  logUsage(agent, model, res.usage);

  const text = res.output_text;
  if (!text) {
    throw new OpenAICallError('OpenAI returned empty response');
  }
  return parser.parse(parseJsonLoose(text));
}
