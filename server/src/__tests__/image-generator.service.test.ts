import { GenerationError } from '../errors/sprite-errors';
import { FetchLike } from '../services/collaborator-http';
import {
  GeminiImageGenerator,
  optimizePromptForSprite,
  resolveModelId
} from '../services/image-generator.service';

const BASE_URL = 'https://gemini.test/v1beta';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('resolveModelId', () => {
  it('should map friendly aliases to model ids', () => {
    expect(resolveModelId('nano-banana')).toBe('gemini-2.5-flash-image');
    expect(resolveModelId('nano-banana-pro')).toBe('gemini-3-pro-image-preview');
  });

  it('should pass unknown ids through', () => {
    expect(resolveModelId('custom-model')).toBe('custom-model');
  });
});

describe('optimizePromptForSprite', () => {
  it('should add segmentation hints to a bare prompt', () => {
    expect(optimizePromptForSprite('a knight')).toBe(
      'a knight, with transparent or solid color background, game sprite style, clearly isolated elements'
    );
  });

  it('should leave prompts that already cover the hints alone', () => {
    const prompt = 'isolated coins as game sprites on a transparent background';
    expect(optimizePromptForSprite(prompt)).toBe(prompt);
  });
});

describe('GeminiImageGenerator', () => {
  const imageBytes = Buffer.from('generated-png');

  it('should call generateContent and return the first inline image', async () => {
    const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>(async () =>
      jsonResponse({
        candidates: [
          {
            content: {
              parts: [{ text: 'Here you go' }, { inlineData: { mimeType: 'image/png', data: imageBytes.toString('base64') } }]
            },
            finishReason: 'STOP'
          }
        ]
      })
    );
    const generator = new GeminiImageGenerator('test-secret', BASE_URL, 1000, fetchImpl);

    const result = await generator.generate({ prompt: 'a knight', model: 'nano-banana' });

    expect(result.equals(imageBytes)).toBe(true);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/models/gemini-2.5-flash-image:generateContent`);
    expect(new Headers(init?.headers).get('x-goog-api-key')).toBe('test-secret');

    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      contents: [
        {
          role: 'user',
          parts: [
            { text: 'a knight, with transparent or solid color background, game sprite style, clearly isolated elements' }
          ]
        }
      ],
      generationConfig: { responseModalities: ['TEXT', 'IMAGE'] }
    });
  });

  it('should report finish reason and text when no image comes back', async () => {
    const generator = new GeminiImageGenerator('test-secret', BASE_URL, 1000, async () =>
      jsonResponse({
        candidates: [{ content: { parts: [{ text: 'I cannot draw that' }] }, finishReason: 'SAFETY' }]
      })
    );

    await expect(generator.generate({ prompt: 'x', model: 'nano-banana' })).rejects.toThrow(
      'No image generated from API. Finish reason: SAFETY Response text: I cannot draw that'
    );
  });

  it('should include the block reason of a rejected prompt', async () => {
    const generator = new GeminiImageGenerator('test-secret', BASE_URL, 1000, async () =>
      jsonResponse({ promptFeedback: { blockReason: 'OTHER' } })
    );

    await expect(generator.generate({ prompt: 'x', model: 'nano-banana' })).rejects.toThrow(
      'No image generated from API. Blocked: OTHER'
    );
  });

  it('should treat upstream 5xx as transient', async () => {
    const generator = new GeminiImageGenerator('test-secret', BASE_URL, 1000, async () =>
      jsonResponse({ error: 'overloaded' }, 500)
    );

    const error = await generator.generate({ prompt: 'x', model: 'nano-banana' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ transient: true });
  });

  it('should treat network failures as transient', async () => {
    const generator = new GeminiImageGenerator('test-secret', BASE_URL, 1000, async () => {
      throw new TypeError('fetch failed');
    });

    await expect(generator.generate({ prompt: 'x', model: 'nano-banana' })).rejects.toMatchObject({
      transient: true,
      message: 'Image generation failed: Request to gemini.test failed: fetch failed'
    });
  });
});
