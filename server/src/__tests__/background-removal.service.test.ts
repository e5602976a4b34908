import { RemovalError } from '../errors/sprite-errors';
import { HttpBackgroundRemover, LocalBackgroundRemover } from '../services/background-removal.service';
import { FetchLike } from '../services/collaborator-http';
import { createImage, decodePng, fillRect, pixelAt, RED, toPng, WHITE } from './helpers/image-fixtures.helper';

describe('LocalBackgroundRemover', () => {
  let remover: LocalBackgroundRemover;

  beforeEach(() => {
    remover = new LocalBackgroundRemover();
  });

  it('should key out the corner colour of an opaque image', async () => {
    const image = fillRect(createImage(20, 20, WHITE), { x: 5, y: 5, width: 10, height: 10 }, RED);

    const result = await decodePng(await remover.removeBackground(await toPng(image)));

    expect(pixelAt(result, 0, 0)[3]).toBe(0);
    expect(pixelAt(result, 19, 19)[3]).toBe(0);
    expect(pixelAt(result, 10, 10)).toEqual(RED);
  });

  it('should soften pixels close to the key colour', () => {
    const rgba = Buffer.from([
      255, 255, 255, 255, // distance 0
      235, 235, 235, 255, // distance 60 -> start of the ramp
      225, 225, 225, 255, // distance 90 -> halfway
      195, 195, 195, 255 // distance 180 -> untouched
    ]);

    remover.applyChromaKey(rgba, 255, 255, 255);

    expect([rgba[3], rgba[7], rgba[11], rgba[15]]).toEqual([0, 0, 128, 255]);
  });

  it('should return images that already have transparency unchanged', async () => {
    const png = await toPng(fillRect(createImage(10, 10), { x: 2, y: 2, width: 4, height: 4 }, RED));

    expect(await remover.removeBackground(png)).toBe(png);
  });

  it('should reject undecodable input', async () => {
    await expect(remover.removeBackground(Buffer.from('not an image'))).rejects.toThrow(RemovalError);
  });
});

describe('HttpBackgroundRemover', () => {
  const url = 'http://matting.test/remove';

  it('should post the image and return the response body', async () => {
    const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>(async () => new Response(Buffer.from('matted')));
    const remover = new HttpBackgroundRemover(url, 1000, fetchImpl);

    const result = await remover.removeBackground(Buffer.from('source'));

    expect(result.toString()).toBe('matted');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [calledUrl, init] = fetchImpl.mock.calls[0];
    expect(calledUrl).toBe(url);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBeInstanceOf(FormData);
  });

  it('should mark upstream 5xx responses as transient', async () => {
    const remover = new HttpBackgroundRemover(url, 1000, async () => new Response('busy', { status: 503 }));

    await expect(remover.removeBackground(Buffer.from('source'))).rejects.toMatchObject({
      code: 'REMOVAL_ERROR',
      transient: true,
      message: 'Background removal failed: Upstream responded 503: busy'
    });
  });

  it('should mark client errors as permanent', async () => {
    const remover = new HttpBackgroundRemover(url, 1000, async () => new Response('bad', { status: 400 }));

    await expect(remover.removeBackground(Buffer.from('source'))).rejects.toMatchObject({ transient: false });
  });

  it('should treat timeouts as transient', async () => {
    const remover = new HttpBackgroundRemover(url, 50, async () => {
      const error = new Error('The operation was aborted due to timeout');
      error.name = 'TimeoutError';
      throw error;
    });

    await expect(remover.removeBackground(Buffer.from('source'))).rejects.toMatchObject({
      transient: true,
      message: 'Background removal failed: Request to matting.test timed out after 50ms'
    });
  });

  it('should reject an empty response body', async () => {
    const remover = new HttpBackgroundRemover(url, 1000, async () => new Response(''));

    await expect(remover.removeBackground(Buffer.from('source'))).rejects.toThrow(
      'Background removal service returned an empty body'
    );
  });
});
