import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import path from 'path';

import { DEFAULT_POSTCARD_CONFIG } from '../config';
import { BatchRunner } from '../services/batch/batchRunner';
import { ImageDecoder } from '../services/imaging/imageDecoder';
import { CaptionRenderer } from '../services/postcard/captionRenderer';
import { Composer, PostcardComposer } from '../services/postcard/postcardComposer';
import { BLUE, RED, makeTempDir, removeDir, solidImage } from './helpers/images.helper';

const config = DEFAULT_POSTCARD_CONFIG;

class RecordingComposer implements Composer {
  readonly calls: Array<[string, string]> = [];

  constructor(private readonly failing: string[] = []) {}

  async compose(sourcePath: string, outputPath: string) {
    this.calls.push([sourcePath, outputPath]);
    return !this.failing.includes(path.basename(sourcePath));
  }
}

describe('BatchRunner', () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await makeTempDir();
    inputDir = path.join(root, 'in');
    outputDir = path.join(root, 'out', 'postcards');
    await mkdir(inputDir);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should name outputs after the source stem', () => {
    const runner = new BatchRunner({ config, composer: new RecordingComposer() });
    expect(runner.outputName('IMG_0042.JPG')).toBe('IMG_0042_postcard.jpg');
    expect(runner.outputName('trip.2024.nef')).toBe('trip.2024_postcard.jpg');
  });

  it('should select supported extensions case-insensitively', () => {
    const runner = new BatchRunner({ config, composer: new RecordingComposer() });
    for (const name of ['a.jpg', 'b.JPEG', 'c.Nef', 'd.raw', 'e.TIFF', 'f.png']) {
      expect(runner.isSupported(name)).toBe(true);
    }
    for (const name of ['photo.bmp', 'notes.txt', 'archive.tif', 'jpg']) {
      expect(runner.isSupported(name)).toBe(false);
    }
  });

  it('should process supported files in name order and ignore the rest', async () => {
    for (const name of ['b.png', 'a.JPG', 'photo.bmp', 'readme.txt']) {
      await writeFile(path.join(inputDir, name), 'x');
    }
    await mkdir(path.join(inputDir, 'nested.jpg'));
    const composer = new RecordingComposer();

    const summary = await new BatchRunner({ config, composer }).run(inputDir, outputDir);

    expect(composer.calls).toEqual([
      [path.join(inputDir, 'a.JPG'), path.join(outputDir, 'a_postcard.jpg')],
      [path.join(inputDir, 'b.png'), path.join(outputDir, 'b_postcard.jpg')],
    ]);
    expect(summary).toMatchObject({ attempted: 2, succeeded: 2, failed: 0 });
    expect((await stat(outputDir)).isDirectory()).toBe(true);
  });

  it('should keep going after a failed file', async () => {
    for (const name of ['1.jpg', '2.jpg', '3.jpg']) {
      await writeFile(path.join(inputDir, name), 'x');
    }
    const composer = new RecordingComposer(['2.jpg']);

    const summary = await new BatchRunner({ config, composer }).run(inputDir, outputDir);

    expect(composer.calls).toHaveLength(3);
    expect(summary.attempted).toBe(3);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.results.map((result) => result.ok)).toEqual([true, false, true]);
  });

  it('should refuse to run without an input directory', async () => {
    const runner = new BatchRunner({ config, composer: new RecordingComposer() });
    await expect(runner.run(path.join(root, 'nowhere'), outputDir)).rejects.toThrow('ENOENT');
  });

  it('should write identical postcards when run twice', async () => {
    await solidImage(640, 480, RED).jpeg().toFile(path.join(inputDir, 'landscape.jpg'));
    await solidImage(300, 500, BLUE).png().toFile(path.join(inputDir, 'portrait.png'));
    await writeFile(path.join(inputDir, 'broken.jpeg'), 'not an image');
    await writeFile(path.join(inputDir, 'photo.bmp'), 'BM');

    const composer = new PostcardComposer({
      config,
      decoder: new ImageDecoder({ config, readTags: async () => undefined }),
      caption: new CaptionRenderer({
        config,
        fonts: { resolve: async (sizePt) => ({ family: 'sans-serif', sizePt, builtin: true }) },
      }),
    });
    const runner = new BatchRunner({ config, composer });

    const first = await runner.run(inputDir, outputDir);
    const firstBytes = await Promise.all(
      ['landscape_postcard.jpg', 'portrait_postcard.jpg'].map((name) => readFile(path.join(outputDir, name)))
    );
    const second = await runner.run(inputDir, outputDir);
    const secondBytes = await Promise.all(
      ['landscape_postcard.jpg', 'portrait_postcard.jpg'].map((name) => readFile(path.join(outputDir, name)))
    );

    expect(first).toMatchObject({ attempted: 3, succeeded: 2, failed: 1 });
    expect(second).toMatchObject({ attempted: 3, succeeded: 2, failed: 1 });
    expect(firstBytes[0].equals(secondBytes[0])).toBe(true);
    expect(firstBytes[1].equals(secondBytes[1])).toBe(true);
    expect((await readdir(outputDir)).sort()).toEqual(['landscape_postcard.jpg', 'portrait_postcard.jpg']);
  });
});
