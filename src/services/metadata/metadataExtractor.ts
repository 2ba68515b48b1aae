import { z } from 'zod';

import { PostcardConfig } from '../../config';
import { Provider, resolveFirst } from '../../lib/providers';

/** Metadata tags keyed by canonical name (`DateTimeOriginal`, `GPSInfo`, ...). */
export type TagTable = Readonly<Record<string, unknown>>;

export interface CaptureMetadata {
  captureDateText: string;
  locationText: string;
}

export const CAPTURE_TIMESTAMP_TAG = 'DateTimeOriginal';
export const GPS_INFO_TAG = 'GPSInfo';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const exifTimestampSchema = z
  .string()
  .regex(/^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/)
  .transform((value, ctx) => {
    const [year, month, day, hour, minute, second] = value
      .split(/[: ]/)
      .map((part) => Number.parseInt(part, 10));
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    const valid =
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day &&
      hour < 24 &&
      minute < 60 &&
      second < 60;
    if (!valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a calendar timestamp: ${value}` });
      return z.NEVER;
    }
    return { year, month, day };
  });

const formatDay = ({ year, month, day }: { year: number; month: number; day: number }) =>
  `${MONTHS[month - 1]} ${String(day).padStart(2, '0')}, ${year}`;

/**
 * Reformats an EXIF `YYYY:MM:DD HH:MM:SS` timestamp as `Mon DD, YYYY`.
 * Returns undefined when the value does not follow that pattern.
 */
export function formatCaptureDate(raw: unknown): string | undefined {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) return undefined;
    return formatDay({ year: raw.getFullYear(), month: raw.getMonth() + 1, day: raw.getDate() });
  }
  const parsed = exifTimestampSchema.safeParse(raw);
  return parsed.success ? formatDay(parsed.data) : undefined;
}

const nonEmptyText = (value: unknown) => {
  if (value === undefined || value === null) return undefined;
  const text = String(value);
  return text.length > 0 ? text : undefined;
};

const hasGpsData = (value: unknown) => {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return value !== '' && value !== 0;
};

export class MetadataExtractor {
  constructor(private readonly config: PostcardConfig) {}

  extract(tags?: TagTable): CaptureMetadata {
    return {
      captureDateText: this.captureDate(tags),
      locationText: this.location(tags),
    };
  }

  private captureDate(tags?: TagTable) {
    const raw = tags?.[CAPTURE_TIMESTAMP_TAG];
    const providers: Provider<string>[] = [
      () => formatCaptureDate(raw),
      () => nonEmptyText(raw),
    ];
    return resolveFirst(providers, this.config.fallbackDateText);
  }

  // No reverse geocoding: any GPS block maps to the placeholder label.
  private location(tags?: TagTable) {
    const gps = tags?.[GPS_INFO_TAG];
    const providers: Provider<string>[] = [
      () => (hasGpsData(gps) ? this.config.gpsPlaceholderText : undefined),
    ];
    return resolveFirst(providers, this.config.fallbackLocationText);
  }
}
