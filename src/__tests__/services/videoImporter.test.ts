import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import axios, { AxiosHeaders } from 'axios';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import type { Prober } from '../../services/ffmpeg.js';
import { VideoImporter, downloadFile, fileExtension, type Downloader } from '../../services/videoImporter.js';
import { AppError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';
import { capturingLogger, silentLogger } from '../helpers/fakes.js';

const FORMATS = ['mp4', 'avi', 'mov', 'mkv'];

function fakeProber() {
  return { probe: jest.fn<Prober['probe']>().mockResolvedValue({ width: 1920, height: 1080, duration: 42.5 }) };
}

describe('fileExtension', () => {
  it('should lowercase and strip the dot', () => {
    expect(fileExtension('/videos/Promo.MP4')).toBe('mp4');
    expect(fileExtension('/videos/README')).toBe('');
  });
});

describe('VideoImporter', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wm-import-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('importFromFile', () => {
    it('should probe a supported local file', async () => {
      const filePath = path.join(dir, 'promo.MOV');
      fs.writeFileSync(filePath, 'data');
      const prober = fakeProber();
      const importer = new VideoImporter({ supportedFormats: FORMATS, prober, logger: silentLogger() });

      const video = await importer.importFromFile(filePath);

      expect(video).toMatchObject({
        sourceType: 'file',
        sourcePath: path.resolve(filePath),
        originalUrl: null,
        duration: 42.5,
        resolution: { width: 1920, height: 1080 },
        videoId: -1,
      });
      expect(prober.probe).toHaveBeenCalledWith(filePath);
    });

    it('should reject a missing file', async () => {
      const filePath = path.join(dir, 'missing.mp4');
      const importer = new VideoImporter({ supportedFormats: FORMATS, prober: fakeProber(), logger: silentLogger() });

      await expect(importer.importFromFile(filePath)).rejects.toMatchObject({
        userMessage: 'File not found.',
        internalMessage: filePath,
      });
    });

    it('should reject a directory', async () => {
      const importer = new VideoImporter({ supportedFormats: FORMATS, prober: fakeProber(), logger: silentLogger() });

      await expect(importer.importFromFile(dir)).rejects.toMatchObject({ userMessage: 'File not found.' });
    });

    it('should reject an unsupported extension without probing', async () => {
      const filePath = path.join(dir, 'promo.webm');
      fs.writeFileSync(filePath, 'data');
      const prober = fakeProber();
      const importer = new VideoImporter({ supportedFormats: FORMATS, prober, logger: silentLogger() });

      await expect(importer.importFromFile(filePath)).rejects.toMatchObject({
        userMessage: 'Unsupported file format.',
        internalMessage: 'webm',
      });
      expect(prober.probe).not.toHaveBeenCalled();
    });

    it('should wrap probe failures', async () => {
      const filePath = path.join(dir, 'broken.mp4');
      fs.writeFileSync(filePath, 'data');
      const prober = { probe: jest.fn<Prober['probe']>().mockRejectedValue(new Error('moov atom not found')) };
      const importer = new VideoImporter({ supportedFormats: FORMATS, prober, logger: silentLogger() });

      await expect(importer.importFromFile(filePath)).rejects.toMatchObject({
        userMessage: 'Cannot read video metadata.',
        internalMessage: 'moov atom not found',
      });
    });
  });

  describe('importFromUrl', () => {
    function writingDownloader() {
      return jest.fn<Downloader>(async (_url, dest) => {
        fs.writeFileSync(dest, 'downloaded');
      });
    }

    it('should keep the URL file name when its extension is supported', async () => {
      const downloader = writingDownloader();
      const importer = new VideoImporter({
        supportedFormats: FORMATS,
        prober: fakeProber(),
        downloader,
        logger: silentLogger(),
      });
      const url = 'https://cdn.example.com/media/promo%20cut.mov?token=abc';

      const video = await importer.importFromUrl(url, dir);

      const expected = path.join(dir, 'promo cut.mov');
      expect(downloader).toHaveBeenCalledWith(url, expected, {
        signal: undefined,
        logger: expect.any(Logger),
      });
      expect(video).toMatchObject({
        sourceType: 'url',
        sourcePath: path.resolve(expected),
        originalUrl: url,
        duration: 42.5,
      });
    });

    it('should fall back to video.mp4 for other names', async () => {
      const downloader = writingDownloader();
      const importer = new VideoImporter({
        supportedFormats: FORMATS,
        prober: fakeProber(),
        downloader,
        logger: silentLogger(),
      });

      const video = await importer.importFromUrl('https://example.com/watch?v=abc', dir);

      expect(video.sourcePath).toBe(path.resolve(path.join(dir, 'video.mp4')));
    });

    it.each(['not a url', 'ftp://example.com/promo.mp4'])('should reject %s', async (url) => {
      const downloader = writingDownloader();
      const importer = new VideoImporter({
        supportedFormats: FORMATS,
        prober: fakeProber(),
        downloader,
        logger: silentLogger(),
      });

      await expect(importer.importFromUrl(url, dir)).rejects.toMatchObject({ userMessage: 'Invalid video URL.' });
      expect(downloader).not.toHaveBeenCalled();
    });

    it('should wrap download failures', async () => {
      const downloader = jest.fn<Downloader>().mockRejectedValue(new Error('socket hang up'));
      const importer = new VideoImporter({
        supportedFormats: FORMATS,
        prober: fakeProber(),
        downloader,
        logger: silentLogger(),
      });

      const attempt = importer.importFromUrl('https://example.com/promo.mp4', dir);

      await expect(attempt).rejects.toThrow(AppError);
      await expect(attempt).rejects.toMatchObject({
        userMessage: 'Cannot download video from URL.',
        internalMessage: 'socket hang up',
      });
    });

    it('should fail when the download leaves no file behind', async () => {
      const downloader = jest.fn<Downloader>().mockResolvedValue(undefined);
      const importer = new VideoImporter({
        supportedFormats: FORMATS,
        prober: fakeProber(),
        downloader,
        logger: silentLogger(),
      });

      await expect(importer.importFromUrl('https://example.com/promo.mp4', dir)).rejects.toMatchObject({
        userMessage: 'Downloaded file not found or ambiguous.',
      });
    });
  });
});

describe('downloadFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wm-download-test-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should stream the body to disk and log through the given logger', async () => {
    jest.spyOn(axios, 'get').mockResolvedValue({
      data: Readable.from([Buffer.from('abc'), Buffer.from('de')]),
      status: 200,
      statusText: 'OK',
      headers: { 'content-length': '5' },
      config: { headers: new AxiosHeaders() },
    });
    const { logger, lines } = capturingLogger('debug');
    const dest = path.join(dir, 'promo.mp4');

    await downloadFile('https://example.com/promo.mp4', dest, { logger });

    expect(fs.readFileSync(dest, 'utf-8')).toBe('abcde');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain(`[DEBUG] Downloaded 5 bytes {"dest":${JSON.stringify(dest)}}`);
  });

  it('should wrap request failures', async () => {
    jest.spyOn(axios, 'get').mockRejectedValue(new Error('getaddrinfo ENOTFOUND example.com'));

    await expect(
      downloadFile('https://example.com/promo.mp4', path.join(dir, 'promo.mp4'), { logger: silentLogger() })
    ).rejects.toMatchObject({
      userMessage: 'Cannot download video from URL.',
      internalMessage: 'getaddrinfo ENOTFOUND example.com',
    });
  });
});
