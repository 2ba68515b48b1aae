import exifr from 'exifr';
import { z } from 'zod';

import { describeError } from '../../errors';
import { componentLogger } from '../../logger';
import { GPS_INFO_TAG, TagTable } from '../metadata/metadataExtractor';

const log = componentLogger('Decoder');

/** Resolves the metadata embedded in a file, or undefined when it has none. */
export type TagReader = (input: string | Buffer) => Promise<TagTable | undefined>;

const segmentSchema = z.record(z.string(), z.unknown());

const exifrOutputSchema = z
  .object({
    ifd0: segmentSchema.optional(),
    exif: segmentSchema.optional(),
    gps: segmentSchema.optional(),
  })
  .passthrough();

/**
 * exifr keeps each IFD separate (`mergeOutput: false`) and leaves values as
 * stored, so `DateTimeOriginal` arrives as the raw `YYYY:MM:DD HH:MM:SS`
 * string and the GPS IFD can be exposed whole under `GPSInfo`.
 */
export const readExifTags: TagReader = async (input) => {
  let output: unknown;
  try {
    output = await exifr.parse(input, {
      tiff: true,
      exif: true,
      gps: true,
      ifd1: false,
      xmp: false,
      icc: false,
      iptc: false,
      mergeOutput: false,
      reviveValues: false,
    });
  } catch (error) {
    log.debug(`No readable metadata: ${describeError(error)}`);
    return undefined;
  }

  const parsed = exifrOutputSchema.safeParse(output);
  if (!parsed.success) {
    return undefined;
  }
  const { ifd0, exif, gps } = parsed.data;
  if (!ifd0 && !exif && !gps) {
    return undefined;
  }
  return {
    ...ifd0,
    ...exif,
    ...(gps ? { [GPS_INFO_TAG]: gps } : {}),
  };
};
