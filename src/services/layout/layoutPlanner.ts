import { PostcardConfig } from '../../config';
import { LayoutError } from '../../errors';

export interface ContentSize {
  width: number;
  height: number;
}

export interface CanvasPlan {
  canvasWidth: number;
  canvasHeight: number;
  rotated: boolean;
  contentWidth: number;
  contentHeight: number;
  contentOffsetX: number;
  contentOffsetY: number;
  stripTopY: number;
  stripHeight: number;
}

const assertDimensions = (width: number, height: number) => {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new LayoutError(`Invalid source dimensions ${width}x${height}`);
  }
};

/**
 * Geometry for a portrait canvas with a caption strip along the bottom.
 * The photo sits flush with the top edge, horizontally centred; the strip
 * starts right under it.
 */
export class LayoutPlanner {
  constructor(private readonly config: PostcardConfig) {}

  /** Height left for the photo once the caption strip is reserved. */
  private get regionHeight() {
    return this.config.canvasHeight * (1 - this.config.stripRatio);
  }

  private fitScale(width: number, height: number) {
    return Math.min(this.config.canvasWidth / width, this.regionHeight / height);
  }

  /**
   * Landscape sources are turned a quarter only when doing so enlarges the
   * printed photo by more than `rotationGain`. Near-square shots stay upright.
   */
  planRotation(width: number, height: number): boolean {
    assertDimensions(width, height);
    if (width <= height) {
      return false;
    }
    const unrotated = this.fitScale(width, height);
    const rotated = this.fitScale(height, width);
    return rotated > unrotated * this.config.rotationGain;
  }

  planContentSize(width: number, height: number): ContentSize {
    assertDimensions(width, height);
    const availableWidth = this.config.canvasWidth;
    const availableHeight = Math.floor(this.regionHeight);

    // The binding side lands exactly on its bound.
    const widthBound = availableWidth / width <= availableHeight / height;
    const scaled = widthBound
      ? { width: availableWidth, height: Math.floor((height * availableWidth) / width) }
      : { width: Math.floor((width * availableHeight) / height), height: availableHeight };

    return {
      width: Math.max(1, scaled.width),
      height: Math.max(1, scaled.height),
    };
  }

  planCanvas(contentWidth: number, contentHeight: number, rotated = false): CanvasPlan {
    const { canvasWidth, canvasHeight, stripRatio } = this.config;
    return {
      canvasWidth,
      canvasHeight,
      rotated,
      contentWidth,
      contentHeight,
      contentOffsetX: Math.floor((canvasWidth - contentWidth) / 2),
      contentOffsetY: 0,
      stripTopY: contentHeight,
      stripHeight: Math.floor(canvasHeight * stripRatio),
    };
  }

  plan(sourceWidth: number, sourceHeight: number): CanvasPlan {
    const rotated = this.planRotation(sourceWidth, sourceHeight);
    const [width, height] = rotated ? [sourceHeight, sourceWidth] : [sourceWidth, sourceHeight];
    const content = this.planContentSize(width, height);
    return this.planCanvas(content.width, content.height, rotated);
  }
}
