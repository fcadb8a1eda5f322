import { describe, it, expect, jest } from '@jest/globals';
import type { Prober } from '../../services/ffmpeg.js';
import { FfmpegFrameSource } from '../../services/frameSource.js';
import { AppError } from '../../utils/errors.js';
import { silentLogger } from '../helpers/fakes.js';

describe('FfmpegFrameSource', () => {
  it('should size the reader from the stream metadata', async () => {
    const prober = {
      probe: jest.fn<Prober['probe']>().mockResolvedValue({ width: 320, height: 240, duration: 4 }),
    };
    const source = new FfmpegFrameSource(prober, silentLogger());

    const reader = await source.open('/x/clip_1.mp4');

    expect(prober.probe).toHaveBeenCalledWith('/x/clip_1.mp4');
    expect([reader.width, reader.height]).toEqual([320, 240]);
    reader.close();
    await expect(reader.read(0)).rejects.toThrow('Frame reader for /x/clip_1.mp4 is closed');
  });

  it('should report an unreadable segment with its path', async () => {
    const prober = {
      probe: jest
        .fn<Prober['probe']>()
        .mockRejectedValue(new AppError('Cannot read video metadata.', 'Invalid data found when processing input')),
    };
    const source = new FfmpegFrameSource(prober, silentLogger());

    const attempt = source.open('/x/clip_1.mp4');

    await expect(attempt).rejects.toThrow(AppError);
    await expect(attempt).rejects.toMatchObject({
      userMessage: 'Cannot open clip file for frame extraction.',
      internalMessage: '/x/clip_1.mp4',
    });
  });
});
