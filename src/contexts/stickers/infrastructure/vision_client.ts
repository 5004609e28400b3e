/**
 * Vision Client
 *
 * Classifies and describes sticker images through an OpenAI-compatible
 * chat completions API with image input.
 */

import OpenAI from 'openai';
import { withSpan } from '../../../../framework/telemetry/otel.ts';
import { getLogger, type Logger } from '../../../../framework/telemetry/logger.ts';
import { toError } from '../../../../framework/http/errors.ts';
import {
  VisionError,
  type DoroPrediction,
  type ImageDescription,
  type StickerClassifier,
  type StickerDescriber,
} from '../application/ports.ts';

export const DEFAULT_DESCRIPTION = 'Wild DORO sticker';
export const UNSAFE_DESCRIPTION = 'Unsafe DORO sticker';

const DESCRIPTION_MAX_CHARS = 10;

const UNSAFE_KEYWORDS = ['gore', 'violence', 'violent', 'nsfw', 'explicit', 'unsafe', 'ai-generated', 'ai generated'];

const TEXT_HINT = /\b(text|words?|caption)\b/i;

const CLASSIFY_PROMPT = [
  'You are judging whether an image is a DORO sticker: the round pink-haired',
  'cartoon character with a wide smile, in any style or remix.',
  'Reply with JSON only, in the form {"doro_probability": p}, where p is a',
  'number between 0 and 1.',
].join(' ');

const DESCRIBE_PROMPT = [
  'Analyse this sticker:',
  `1. Extract the text it shows, at most ${DESCRIPTION_MAX_CHARS} characters.`,
  '2. Decide whether it contains readable text.',
  '3. Decide whether it is safe: no gore, violence or sexual content and no mention of being AI generated.',
  'Reply with JSON holding three fields:',
  '"description" (the text, at most 10 characters), "has_text" (boolean), "is_safe" (boolean).',
].join('\n');

export interface VisionRequest {
  prompt: string;
  image: Uint8Array;
  mimeType: string;
  maxTokens: number;
}

/**
 * Sends one image and prompt to the model; resolves to the reply text
 */
export type VisionCompletion = (request: VisionRequest) => Promise<string | null>;

export interface VisionClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  /** Request timeout in seconds */
  timeout?: number;
  logger?: Logger;
  /** Replaces the OpenAI client, mainly for tests */
  complete?: VisionCompletion;
}

function round4(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}

function truncate(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

function extractJson(reply: string): string | null {
  const match = /\{[\s\S]*\}/.exec(reply);
  return match ? match[0] : null;
}

/**
 * Turn a classifier reply into a prediction; unreadable replies count as
 * not DORO
 */
export function parseClassification(reply: string | null): DoroPrediction {
  let probability = 0;

  const json = reply ? extractJson(reply) : null;
  if (json) {
    try {
      const parsed: unknown = JSON.parse(json);
      if (typeof parsed === 'object' && parsed !== null && 'doro_probability' in parsed) {
        const value = parsed.doro_probability;
        if (typeof value === 'number' && Number.isFinite(value)) {
          probability = Math.min(1, Math.max(0, value));
        }
      }
    } catch {
      probability = 0;
    }
  }

  const isDoro = probability >= 0.5;
  return {
    isDoro,
    confidence: isDoro ? probability : round4(1 - probability),
    probabilities: {
      doro: probability,
      nonDoro: round4(1 - probability),
    },
  };
}

/**
 * Turn a describer reply into a description with text and safety flags
 */
export function parseDescription(reply: string): ImageDescription {
  const text = reply.trim();
  let description: string;
  let hasText: boolean;
  let isSafe: boolean;

  const json = extractJson(text);
  if (json) {
    try {
      const parsed: unknown = JSON.parse(json);
      const fields = new Map<string, unknown>(
        typeof parsed === 'object' && parsed !== null ? Object.entries(parsed) : []
      );
      const value = fields.get('description');
      description = typeof value === 'string' ? value : '';
      hasText = fields.get('has_text') === true;
      isSafe = fields.get('is_safe') === true;
    } catch {
      description = '';
      hasText = false;
      isSafe = false;
    }
  } else {
    description = truncate(text, DESCRIPTION_MAX_CHARS);
    hasText = TEXT_HINT.test(text);
    const lowered = text.toLowerCase();
    isSafe = !UNSAFE_KEYWORDS.some((keyword) => lowered.includes(keyword));
  }

  description = truncate(description, DESCRIPTION_MAX_CHARS).trim();
  if (description === '' || description.toLowerCase() === 'none') {
    description = DEFAULT_DESCRIPTION;
  }
  if (!isSafe) {
    description = UNSAFE_DESCRIPTION;
  }

  return { description, hasText, isSafe };
}

/**
 * Vision model client
 */
export class VisionClient implements StickerClassifier, StickerDescriber {
  private client: OpenAI | null = null;
  private logger: Logger;
  private complete: VisionCompletion;

  constructor(private options: VisionClientOptions) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'vision' });
    this.complete = options.complete ?? ((request) => this.openaiComplete(request));
  }

  /**
   * Ask the model whether the image is a DORO
   */
  async predict(image: Uint8Array, mimeType: string): Promise<DoroPrediction> {
    const reply = await withSpan('vision.classify', async () => {
      try {
        return await this.complete({ prompt: CLASSIFY_PROMPT, image, mimeType, maxTokens: 50 });
      } catch (error) {
        throw new VisionError(`Vision classification failed: ${toError(error).message}`, { cause: error });
      }
    });

    const prediction = parseClassification(reply);
    this.logger.debug('Classified image', { reply, confidence: prediction.confidence });
    return prediction;
  }

  /**
   * Describe the image and screen it; failures fall back to an unsafe verdict
   */
  async describe(image: Uint8Array, mimeType: string): Promise<ImageDescription> {
    try {
      const reply = await withSpan('vision.describe', () =>
        this.complete({ prompt: DESCRIBE_PROMPT, image, mimeType, maxTokens: 150 })
      );
      this.logger.debug('Described image', { reply });
      return parseDescription(reply ?? '');
    } catch (error) {
      this.logger.error('Image description failed', toError(error));
      return { description: DEFAULT_DESCRIPTION, hasText: false, isSafe: false };
    }
  }

  private async openaiComplete(request: VisionRequest): Promise<string | null> {
    const completion = await this.openai().chat.completions.create({
      model: this.options.model,
      max_tokens: request.maxTokens,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image_url',
              image_url: {
                url: `data:${request.mimeType};base64,${Buffer.from(request.image).toString('base64')}`,
              },
            },
            { type: 'text', text: request.prompt },
          ],
        },
      ],
    });

    return completion.choices[0]?.message?.content ?? null;
  }

  private openai(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new VisionError('OPENAI_API_KEY is not set');
      }
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseUrl,
        timeout: (this.options.timeout ?? 30) * 1000,
      });
    }
    return this.client;
  }
}
