import path from 'path';
import { z } from 'zod';

const colorSchema = z.object({
  r: z.number().int().min(0).max(255),
  g: z.number().int().min(0).max(255),
  b: z.number().int().min(0).max(255),
});

const extensionSchema = z
  .string()
  .regex(/^\.[a-z0-9]+$/i, 'Extensions start with a dot')
  .transform((value) => value.toLowerCase());

const postcardConfigSchema = z.object({
  canvasWidth: z.number().int().positive(),
  canvasHeight: z.number().int().positive(),
  backgroundColor: colorSchema,
  textColor: colorSchema,
  stripRatio: z.number().gt(0).lt(1),
  rotationGain: z.number().positive(),
  textMarginX: z.number().int().min(0),
  fontSizePt: z.number().positive(),
  jpegQuality: z.number().int().min(1).max(100),
  dpi: z.number().positive(),
  fallbackDateText: z.string().min(1),
  fallbackLocationText: z.string().min(1),
  gpsPlaceholderText: z.string().min(1),
  outputSuffix: z.string().min(1),
  supportedExtensions: z.array(extensionSchema).nonempty(),
  rawExtensions: z.array(extensionSchema),
});

export type RgbColor = z.infer<typeof colorSchema>;

export type PostcardConfig = Readonly<z.infer<typeof postcardConfigSchema>>;

/** A6 (105mm × 148mm) at 300 DPI, warm off-white strip, soft grey caption. */
const DEFAULTS: z.input<typeof postcardConfigSchema> = {
  canvasWidth: 1240,
  canvasHeight: 1748,
  backgroundColor: { r: 248, g: 246, b: 240 },
  textColor: { r: 90, g: 90, b: 90 },
  stripRatio: 0.18,
  rotationGain: 1.1,
  textMarginX: 40,
  fontSizePt: 32,
  jpegQuality: 95,
  dpi: 300,
  fallbackDateText: '2024.01.01',
  fallbackLocationText: 'SHENZHEN',
  gpsPlaceholderText: 'LOCATION',
  outputSuffix: '_postcard.jpg',
  supportedExtensions: ['.jpg', '.jpeg', '.nef', '.raw', '.tiff', '.png'],
  rawExtensions: ['.nef', '.raw'],
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
};

export function createPostcardConfig(
  overrides: Partial<z.input<typeof postcardConfigSchema>> = {}
): PostcardConfig {
  return deepFreeze(postcardConfigSchema.parse({ ...DEFAULTS, ...overrides }));
}

export const DEFAULT_POSTCARD_CONFIG = createPostcardConfig();

export interface Settings {
  inputDir: string;
  outputDir: string;
}

const settingsSchema = z.object({
  inputDir: z.string().trim().min(1, 'Input directory must not be empty'),
  outputDir: z.string().trim().min(1, 'Output directory must not be empty'),
});

/**
 * Run settings for the CLI. Positional arguments win over
 * `POSTCARD_INPUT_DIR` / `POSTCARD_OUTPUT_DIR`, which win over the defaults.
 */
export function loadSettings(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Settings {
  const [inputArg, outputArg] = argv;
  const parsed = settingsSchema.parse({
    inputDir: inputArg ?? env.POSTCARD_INPUT_DIR ?? 'PostcardPhotos',
    outputDir: outputArg ?? env.POSTCARD_OUTPUT_DIR ?? 'PostcardAfterProcess',
  });
  return {
    inputDir: path.resolve(cwd, parsed.inputDir),
    outputDir: path.resolve(cwd, parsed.outputDir),
  };
}
