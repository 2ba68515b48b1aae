import { readFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';

import { PostcardConfig } from '../../config';
import { DecodeError, describeError } from '../../errors';
import { componentLogger } from '../../logger';
import { TagTable } from '../metadata/metadataExtractor';
import { TagReader, readExifTags } from './tagReader';

const log = componentLogger('Decoder');

/** Decoded 8-bit sRGB pixels, interleaved, plus whatever metadata came with them. */
export interface SourceImage {
  readonly pixels: Buffer;
  readonly width: number;
  readonly height: number;
  readonly channels: sharp.OutputInfo['channels'];
  readonly tags?: TagTable;
}

interface ImageDecoderOptions {
  config: PostcardConfig;
  readTags?: TagReader;
  maxPreviewCandidates?: number;
}

const JPEG_SOI = Buffer.from([0xff, 0xd8, 0xff]);

/** Offsets of every JPEG start-of-image marker, up to `limit`. */
export const findJpegMarkers = (buffer: Buffer, limit: number) => {
  const offsets: number[] = [];
  let index = buffer.indexOf(JPEG_SOI);
  while (index !== -1 && offsets.length < limit) {
    offsets.push(index);
    index = buffer.indexOf(JPEG_SOI, index + JPEG_SOI.length);
  }
  return offsets;
};

const toPixels = async (image: sharp.Sharp) => {
  const { data, info } = await image
    .toColourspace('srgb')
    .raw({ depth: 'uchar' })
    .toBuffer({ resolveWithObject: true });
  return { pixels: data, width: info.width, height: info.height, channels: info.channels };
};

export class ImageDecoder {
  private readonly readTags: TagReader;
  private readonly maxPreviewCandidates: number;

  constructor(private readonly options: ImageDecoderOptions) {
    this.readTags = options.readTags ?? readExifTags;
    this.maxPreviewCandidates = options.maxPreviewCandidates ?? 32;
  }

  isRaw(filePath: string) {
    return this.options.config.rawExtensions.includes(path.extname(filePath).toLowerCase());
  }

  async decode(filePath: string): Promise<SourceImage> {
    let file: Buffer;
    try {
      file = await readFile(filePath);
    } catch (error) {
      throw new DecodeError(`Cannot read ${filePath}: ${describeError(error)}`, filePath, {
        cause: error,
      });
    }

    let decoded: Omit<SourceImage, 'tags'>;
    try {
      decoded = this.isRaw(filePath) ? await this.decodeRaw(file) : await toPixels(sharp(file));
    } catch (error) {
      throw new DecodeError(`Cannot decode ${filePath}: ${describeError(error)}`, filePath, {
        cause: error,
      });
    }

    const tags = await this.readTags(file);
    log.debug(
      `${path.basename(filePath)} ${decoded.width}x${decoded.height}, ${
        tags ? Object.keys(tags).length : 0
      } tag(s)`
    );
    return { ...decoded, tags };
  }

  /**
   * Camera raw files carry a full-size JPEG rendition next to the sensor
   * data. The largest embedded JPEG that decodes wins; libvips' own loader
   * is the last resort.
   */
  private async decodeRaw(file: Buffer) {
    let best: { offset: number; area: number } | undefined;
    for (const offset of findJpegMarkers(file, this.maxPreviewCandidates)) {
      const meta = await sharp(file.subarray(offset), { failOn: 'none' })
        .metadata()
        .catch(() => undefined);
      if (meta?.format !== 'jpeg' || !meta.width || !meta.height) {
        continue;
      }
      const area = meta.width * meta.height;
      if (!best || area > best.area) {
        best = { offset, area };
      }
    }

    if (best) {
      log.debug(`Using embedded preview at byte ${best.offset}`);
      return toPixels(sharp(file.subarray(best.offset), { failOn: 'none' }));
    }
    log.warn('No embedded preview found, loading raw file directly');
    return toPixels(sharp(file));
  }
}
