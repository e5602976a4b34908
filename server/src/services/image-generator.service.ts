import sharp from 'sharp';
import { z } from 'zod';
import { GenerationError } from '../errors/sprite-errors';
import { callCollaborator, FetchLike } from './collaborator-http';

export interface GenerateRequest {
  prompt: string;
  model: string;
  /** Optional image the model should base its output on */
  referenceImage?: Buffer;
  temperature?: number;
}

/**
 * Produces a source image from a text prompt
 */
export interface ImageGenerator {
  generate(request: GenerateRequest): Promise<Buffer>;
}

export const MODEL_ALIASES: Record<string, string> = {
  'nano-banana': 'gemini-2.5-flash-image',
  'nano-banana-pro': 'gemini-3-pro-image-preview'
};

export const DEFAULT_MODEL = 'nano-banana';

export function resolveModelId(model: string): string {
  return MODEL_ALIASES[model] ?? model;
}

/**
 * Nudge a prompt towards output that segments well: plain background,
 * sprite styling, separated elements. Hints the prompt already covers are skipped.
 */
export function optimizePromptForSprite(prompt: string): string {
  const lower = prompt.toLowerCase();
  const additions: string[] = [];

  if (!lower.includes('transparent') && !lower.includes('background')) {
    additions.push('with transparent or solid color background');
  }
  if (!lower.includes('sprite') && !lower.includes('game')) {
    additions.push('game sprite style');
  }
  if (!lower.includes('isolated') && !lower.includes('separate')) {
    additions.push('clearly isolated elements');
  }

  return additions.length > 0 ? `${prompt}, ${additions.join(', ')}` : prompt;
}

const partSchema = z
  .object({
    text: z.string().optional(),
    inlineData: z
      .object({
        mimeType: z.string().optional(),
        data: z.string()
      })
      .optional()
  })
  .passthrough();

const generateContentResponseSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            content: z.object({ parts: z.array(partSchema).optional() }).passthrough().optional(),
            finishReason: z.string().optional()
          })
          .passthrough()
      )
      .optional(),
    promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional()
  })
  .passthrough();

type GenerateContentResponse = z.infer<typeof generateContentResponseSchema>;

/**
 * Gemini image generation over the public REST API
 */
export class GeminiImageGenerator implements ImageGenerator {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async generate(request: GenerateRequest): Promise<Buffer> {
    const modelId = resolveModelId(request.model);
    const prompt = optimizePromptForSprite(request.prompt);
    console.log(`[ImageGenerator] Calling ${modelId} (prompt: ${prompt.slice(0, 50)}...)`);

    const parts: Array<Record<string, unknown>> = [];
    if (request.referenceImage) {
      const reference = await sharp(request.referenceImage).png().toBuffer();
      parts.push({ inlineData: { mimeType: 'image/png', data: reference.toString('base64') } });
    }
    parts.push({ text: prompt });

    const response = await callCollaborator(
      this.fetchImpl,
      `${this.baseUrl}/models/${encodeURIComponent(modelId)}:generateContent`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts }],
          generationConfig: {
            responseModalities: ['TEXT', 'IMAGE'],
            temperature: request.temperature ?? 1.0
          }
        })
      },
      this.timeoutMs,
      (message, transient) => new GenerationError(`Image generation failed: ${message}`, transient)
    );

    const parsed = generateContentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GenerationError(`Unexpected generation response: ${parsed.error.issues[0].message}`);
    }

    return this.extractImage(parsed.data);
  }

  private extractImage(body: GenerateContentResponse): Buffer {
    for (const candidate of body.candidates ?? []) {
      for (const part of candidate.content?.parts ?? []) {
        if (part.inlineData) {
          return Buffer.from(part.inlineData.data, 'base64');
        }
      }
    }

    let message = 'No image generated from API.';
    const first = body.candidates?.[0];
    if (first?.finishReason) {
      message += ` Finish reason: ${first.finishReason}`;
    }
    const text = first?.content?.parts?.find(part => part.text)?.text;
    if (text) {
      message += ` Response text: ${text.slice(0, 200)}`;
    }
    if (body.promptFeedback?.blockReason) {
      message += ` Blocked: ${body.promptFeedback.blockReason}`;
    }
    throw new GenerationError(message);
  }
}
