import { mkdir, readdir } from 'fs/promises';
import path from 'path';

import { PostcardConfig } from '../../config';
import { componentLogger } from '../../logger';
import { Composer } from '../postcard/postcardComposer';

const log = componentLogger('Batch');

export interface FileResult {
  sourcePath: string;
  outputPath: string;
  ok: boolean;
}

export interface BatchSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  results: FileResult[];
}

interface BatchRunnerOptions {
  config: PostcardConfig;
  composer: Composer;
}

export class BatchRunner {
  constructor(private readonly options: BatchRunnerOptions) {}

  isSupported(fileName: string) {
    return this.options.config.supportedExtensions.includes(path.extname(fileName).toLowerCase());
  }

  outputName(fileName: string) {
    return `${path.parse(fileName).name}${this.options.config.outputSuffix}`;
  }

  /** Regular files with a supported extension, in file-name order. */
  async listCandidates(inputDir: string): Promise<string[]> {
    const entries = await readdir(inputDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && this.isSupported(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async run(inputDir: string, outputDir: string): Promise<BatchSummary> {
    await mkdir(outputDir, { recursive: true });
    const candidates = await this.listCandidates(inputDir);
    log.info(`${candidates.length} photo(s) found in ${inputDir}`);

    const results: FileResult[] = [];
    for (const name of candidates) {
      const sourcePath = path.join(inputDir, name);
      const outputPath = path.join(outputDir, this.outputName(name));
      log.info(`Processing ${name}`);
      const ok = await this.options.composer.compose(sourcePath, outputPath);
      results.push({ sourcePath, outputPath, ok });
    }

    const succeeded = results.filter((result) => result.ok).length;
    const summary = {
      attempted: results.length,
      succeeded,
      failed: results.length - succeeded,
      results,
    };
    log.info(`Processed ${summary.succeeded} of ${summary.attempted} photo(s)`);
    return summary;
  }
}
