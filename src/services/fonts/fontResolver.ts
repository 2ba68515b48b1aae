import { access } from 'fs/promises';

import { componentLogger } from '../../logger';
import { AsyncProvider, resolveFirstAsync } from '../../lib/providers';

const log = componentLogger('Fonts');

export interface FontResource {
  family: string;
  sizePt: number;
  /** Font file backing the family; absent for the built-in default. */
  file?: string;
  builtin: boolean;
}

/** Anything that can hand out a font for a point size. */
export interface FontSource {
  resolve(sizePt: number): Promise<FontResource>;
}

export interface FontCandidate {
  family: string;
  files: string[];
}

export const SYSTEM_FONT_CANDIDATES: FontCandidate[] = [
  {
    family: 'Arial',
    files: [
      'C:\\Windows\\Fonts\\arial.ttf',
      '/System/Library/Fonts/Arial.ttf',
      '/System/Library/Fonts/Supplemental/Arial.ttf',
      '/Library/Fonts/Arial.ttf',
    ],
  },
  {
    family: 'DejaVu Sans',
    files: ['/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf', '/usr/share/fonts/TTF/DejaVuSans.ttf'],
  },
];

export const BUILTIN_FONT_FAMILY = 'sans-serif';

export type FileProbe = (file: string) => Promise<boolean>;

const fileExists: FileProbe = (file) =>
  access(file).then(
    () => true,
    () => false
  );

interface FontResolverOptions {
  candidates?: FontCandidate[];
  probe?: FileProbe;
}

export class FontResolver implements FontSource {
  private readonly candidates: FontCandidate[];
  private readonly probe: FileProbe;
  private readonly resolved = new Map<number, FontResource>();

  constructor(options: FontResolverOptions = {}) {
    this.candidates = options.candidates ?? SYSTEM_FONT_CANDIDATES;
    this.probe = options.probe ?? fileExists;
  }

  async resolve(sizePt: number): Promise<FontResource> {
    const cached = this.resolved.get(sizePt);
    if (cached) {
      return cached;
    }

    const providers: AsyncProvider<FontResource>[] = this.candidates.flatMap(({ family, files }) =>
      files.map((file) => async () =>
        (await this.probe(file)) ? { family, file, sizePt, builtin: false } : undefined
      )
    );
    const font = await resolveFirstAsync(providers, {
      family: BUILTIN_FONT_FAMILY,
      sizePt,
      builtin: true,
    });

    log.info(
      font.builtin
        ? `No scalable font found, using built-in ${font.family}`
        : `Using ${font.family} (${font.file})`
    );
    this.resolved.set(sizePt, font);
    return font;
  }
}
