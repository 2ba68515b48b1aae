import { writeFile } from 'fs/promises';
import path from 'path';
import sharp, { OverlayOptions } from 'sharp';

import { PostcardConfig } from '../../config';
import { EncodeError, PostcardError, describeError } from '../../errors';
import { componentLogger } from '../../logger';
import { ImageDecoder, SourceImage } from '../imaging/imageDecoder';
import { CanvasPlan, LayoutPlanner } from '../layout/layoutPlanner';
import { CaptureMetadata, MetadataExtractor } from '../metadata/metadataExtractor';
import { CaptionRenderer } from './captionRenderer';

const log = componentLogger('Postcard');

export interface PostcardRender {
  buffer: Buffer;
  plan: CanvasPlan;
  metadata: CaptureMetadata;
  captioned: boolean;
}

/** What the batch runner needs from a composer. */
export interface Composer {
  compose(sourcePath: string, outputPath: string): Promise<boolean>;
}

interface PostcardComposerOptions {
  config: PostcardConfig;
  decoder?: ImageDecoder;
  metadata?: MetadataExtractor;
  layout?: LayoutPlanner;
  caption?: CaptionRenderer;
}

export class PostcardComposer implements Composer {
  private readonly decoder: ImageDecoder;
  private readonly metadata: MetadataExtractor;
  private readonly layout: LayoutPlanner;
  private readonly caption: CaptionRenderer;

  constructor(private readonly options: PostcardComposerOptions) {
    const { config } = options;
    this.decoder = options.decoder ?? new ImageDecoder({ config });
    this.metadata = options.metadata ?? new MetadataExtractor(config);
    this.layout = options.layout ?? new LayoutPlanner(config);
    this.caption = options.caption ?? new CaptionRenderer({ config });
  }

  async compose(sourcePath: string, outputPath: string): Promise<boolean> {
    try {
      const result = await this.render(sourcePath);
      try {
        await writeFile(outputPath, result.buffer);
      } catch (error) {
        throw new EncodeError(`Cannot write ${outputPath}: ${describeError(error)}`, outputPath, {
          cause: error,
        });
      }
      log.info(
        `${path.basename(sourcePath)} -> ${outputPath}${
          result.plan.rotated ? ' (rotated 90°)' : ''
        }`
      );
      return true;
    } catch (error) {
      const kind = error instanceof PostcardError ? error.name : 'Error';
      log.error(`${kind} for ${sourcePath}: ${describeError(error)}`);
      return false;
    }
  }

  /** Builds the encoded postcard for one source without writing it anywhere. */
  async render(sourcePath: string): Promise<PostcardRender> {
    const source = await this.decoder.decode(sourcePath);
    const metadata = this.metadata.extract(source.tags);
    const plan = this.layout.plan(source.width, source.height);

    const content = await this.fitContent(source, plan);
    const overlays: OverlayOptions[] = [
      { input: content, left: plan.contentOffsetX, top: plan.contentOffsetY },
    ];

    const captionStrip = await this.caption.render(
      metadata,
      plan.canvasWidth,
      plan.stripHeight,
      plan.canvasHeight - plan.stripTopY
    );
    if (captionStrip) {
      overlays.push({ input: captionStrip, left: 0, top: plan.stripTopY });
    }

    const { config } = this.options;
    let buffer: Buffer;
    try {
      buffer = await sharp({
        create: {
          width: plan.canvasWidth,
          height: plan.canvasHeight,
          channels: 3,
          background: config.backgroundColor,
        },
      })
        .composite(overlays)
        .jpeg({ quality: config.jpegQuality })
        .withMetadata({ density: config.dpi })
        .toBuffer();
    } catch (error) {
      throw new EncodeError(`Cannot encode postcard for ${sourcePath}: ${describeError(error)}`, sourcePath, {
        cause: error,
      });
    }

    return { buffer, plan, metadata, captioned: captionStrip !== undefined };
  }

  /** Quarter-turn counter-clockwise when planned, then Lanczos down to the planned size. */
  private async fitContent(source: SourceImage, plan: CanvasPlan) {
    const raw: sharp.CreateRaw = { width: source.width, height: source.height, channels: source.channels };
    let pixels = source.pixels;
    let input: sharp.CreateRaw = raw;
    if (plan.rotated) {
      const { data, info } = await sharp(pixels, { raw })
        .rotate(270)
        .raw()
        .toBuffer({ resolveWithObject: true });
      pixels = data;
      input = { width: info.width, height: info.height, channels: info.channels };
    }
    return sharp(pixels, { raw: input })
      .resize(plan.contentWidth, plan.contentHeight, { fit: 'fill', kernel: 'lanczos3' })
      .png()
      .toBuffer();
  }
}
