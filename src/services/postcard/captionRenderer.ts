import sharp from 'sharp';

import { PostcardConfig, RgbColor } from '../../config';
import { describeError } from '../../errors';
import { componentLogger } from '../../logger';
import { BUILTIN_FONT_FAMILY, FontResolver, FontResource, FontSource } from '../fonts/fontResolver';
import { CaptureMetadata } from '../metadata/metadataExtractor';

const log = componentLogger('Caption');

export interface CaptionLine {
  text: string;
  x: number;
  baseline: number;
}

const escapeXml = (value: string) =>
  value.replace(/[<>&'"]/g, (char) => {
    switch (char) {
      case '<':
        return '&lt;';
      case '>':
        return '&gt;';
      case '&':
        return '&amp;';
      case "'":
        return '&apos;';
      default:
        return '&quot;';
    }
  });

const hex = ({ r, g, b }: RgbColor) =>
  `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;

/** Glyph whose ink bottom marks the baseline of a rendered line. */
const BASELINE_REFERENCE = 'H';

/** Date on the first quarter line of the strip, location on the second. */
export function layoutCaption(
  metadata: CaptureMetadata,
  stripHeight: number,
  marginX: number
): CaptionLine[] {
  const lineSpacing = Math.floor(stripHeight / 4);
  return [
    { text: metadata.captureDateText, x: marginX, baseline: lineSpacing },
    { text: metadata.locationText, x: marginX, baseline: lineSpacing * 2 },
  ];
}

/** Pango text input drawing `text` with the resolved font file, one pixel per point. */
export function textInputFor(text: string, font: FontResource, color: RgbColor): sharp.CreateText {
  return {
    text: `<span foreground="${hex(color)}">${escapeXml(text)}</span>`,
    font: `${font.builtin ? BUILTIN_FONT_FAMILY : font.family} ${font.sizePt}`,
    fontfile: font.file,
    dpi: 72,
    rgba: true,
  };
}

/** Number of rows down to and including the last one with any coverage. */
export function inkDepth(pixels: Buffer, width: number, height: number, channels: number) {
  for (let y = height - 1; y >= 0; y--) {
    for (let x = 0; x < width; x++) {
      if (pixels[(y * width + x) * channels + channels - 1] > 0) {
        return y + 1;
      }
    }
  }
  return 0;
}

interface RenderedLine {
  input: Buffer;
  left: number;
  top: number;
}

interface CaptionRendererOptions {
  config: PostcardConfig;
  fonts?: FontSource;
}

export class CaptionRenderer {
  private readonly fonts: FontSource;

  constructor(private readonly options: CaptionRendererOptions) {
    this.fonts = options.fonts ?? new FontResolver();
  }

  /**
   * Rasterizes the caption onto a transparent strip. `visibleHeight` is how
   * much of the strip fits on the canvas; lines below it are cut off.
   * Resolves to undefined when nothing could be drawn, in which case the
   * postcard is written without a caption.
   */
  async render(
    metadata: CaptureMetadata,
    width: number,
    stripHeight: number,
    visibleHeight = stripHeight
  ): Promise<Buffer | undefined> {
    const height = Math.min(stripHeight, visibleHeight);
    if (width <= 0 || height <= 0) {
      log.warn(`No room for a caption (${width}x${height})`);
      return undefined;
    }
    const { config } = this.options;
    try {
      const font = await this.fonts.resolve(config.fontSizePt);
      const ascent = await this.ascentOf(font);
      const rendered: RenderedLine[] = [];
      for (const line of layoutCaption(metadata, stripHeight, config.textMarginX)) {
        const drawn = await this.drawLine(line, font, ascent, { width, height });
        if (drawn) {
          rendered.push(drawn);
        }
      }
      return await sharp({
        create: { width, height, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } },
      })
        .composite(rendered)
        .png()
        .toBuffer();
    } catch (error) {
      log.warn(`Failed to draw caption: ${describeError(error)}`);
      return undefined;
    }
  }

  /** Distance from the top of a rendered line to its baseline. */
  private async ascentOf(font: FontResource) {
    const reference = textInputFor(BASELINE_REFERENCE, font, this.options.config.textColor);
    const { data, info } = await sharp({ text: reference })
      .raw()
      .toBuffer({ resolveWithObject: true });
    return inkDepth(data, info.width, info.height, info.channels);
  }

  /** Rasterizes one line and crops whatever falls outside the strip. */
  private async drawLine(
    line: CaptionLine,
    font: FontResource,
    ascent: number,
    strip: { width: number; height: number }
  ): Promise<RenderedLine | undefined> {
    if (line.text.trim() === '') {
      return undefined;
    }
    const top = Math.max(0, line.baseline - ascent);
    const text = textInputFor(line.text, font, this.options.config.textColor);
    const { data, info } = await sharp({ text })
      .png()
      .toBuffer({ resolveWithObject: true });
    const width = Math.min(info.width, strip.width - line.x);
    const height = Math.min(info.height, strip.height - top);
    if (width <= 0 || height <= 0) {
      return undefined;
    }
    if (width === info.width && height === info.height) {
      return { input: data, left: line.x, top };
    }
    const input = await sharp(data).extract({ left: 0, top: 0, width, height }).png().toBuffer();
    return { input, left: line.x, top };
  }
}
