/**
 * Project walker.
 *
 * Discovers the files of a project, runs each through the rewrite rules,
 * writes the result into a mirror directory and compares rewritten files
 * with their originals. Files are processed concurrently; results keep
 * discovery order. A file that fails becomes a failure record and the scan
 * carries on.
 */

import { copyFile, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';
import type { Logger } from 'pino';
import { SequenceDiffEngine, decodeText } from '@liftkit/diff-engine';
import type { FileDiffOutcome, SideBySideRow } from '@liftkit/diff-engine';
import { RuleApplier, detectFileKind } from '@liftkit/rewrite-rules';
import { ProjectPathError } from './errors.js';
import type { CliConfig, FileScanRecord, ScanResult } from './types.js';
import { validateOutputPath } from './utils/validator.js';

export interface ProjectWalkerOptions {
  /** Clock for generated file headers */
  clock?: () => Date;
}

interface FileResult {
  record: FileScanRecord;
  outcome?: FileDiffOutcome;
  rows?: SideBySideRow[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ProjectWalker {
  private readonly logger: Logger;
  private readonly config: CliConfig;
  private readonly engine: SequenceDiffEngine;
  private readonly applier: RuleApplier;

  constructor(logger: Logger, config: CliConfig, options: ProjectWalkerOptions = {}) {
    this.logger = logger.child({ component: 'project-walker' });
    this.config = config;
    this.engine = new SequenceDiffEngine(logger, {
      contextLines: config.contextLines,
      topFiles: config.topFiles,
      legacyNamespace: config.legacyNamespace,
      targetNamespace: config.targetNamespace,
    });
    this.applier = new RuleApplier(logger, { clock: options.clock });
  }

  /** Output directory used when none is given: the project path plus the configured suffix */
  defaultOutputPath(projectPath: string): string {
    return projectPath.replace(/[\\/]+$/, '') + this.config.outputSuffix;
  }

  private isIgnoredDir(name: string): boolean {
    return this.config.ignoredDirs.includes(name) || name.endsWith(this.config.outputSuffix);
  }

  /**
   * List project files as sorted posix paths relative to the root,
   * skipping ignored directories and earlier output directories.
   */
  async discoverFiles(dir: string, root?: string): Promise<string[]> {
    const effectiveRoot = root ?? dir;
    const files: string[] = [];

    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (this.isIgnoredDir(entry.name)) {
          this.logger.debug({ dir: fullPath }, 'Skipping ignored directory');
          continue;
        }
        files.push(...(await this.discoverFiles(fullPath, effectiveRoot)));
      } else if (entry.isFile()) {
        files.push(relative(effectiveRoot, fullPath).split('\\').join('/'));
      }
    }

    return files.sort();
  }

  /**
   * Rewrite a project into `outputPath` and compare every rewritten file.
   * An existing output directory is replaced.
   *
   * @throws ProjectPathError when the output directory and the project overlap
   */
  async scan(projectPath: string, outputPath = this.defaultOutputPath(projectPath)): Promise<ScanResult> {
    if (validateOutputPath(outputPath, projectPath).valid) {
      throw new ProjectPathError(outputPath, 'Output directory must not contain the project');
    }
    if (validateOutputPath(projectPath, outputPath).valid) {
      throw new ProjectPathError(outputPath, 'Output directory must not be inside the project');
    }

    this.logger.info({ projectPath, outputPath }, 'Scan started');

    await rm(outputPath, { recursive: true, force: true });
    await mkdir(outputPath, { recursive: true });

    const files = await this.discoverFiles(projectPath);
    this.logger.info({ files: files.length }, 'Files discovered');

    const results = await this.processWithConcurrency(files, projectPath, outputPath);

    const outcomes: FileDiffOutcome[] = [];
    const sideBySide = new Map<string, SideBySideRow[]>();
    for (const result of results) {
      if (result.outcome) outcomes.push(result.outcome);
      if (result.rows) sideBySide.set(result.record.relativePath, result.rows);
    }

    const summary = this.engine.summarizeOutcomes(outcomes);

    this.logger.info(
      {
        files: results.length,
        modified: summary.summary.total_files_modified,
        failed: summary.failed_files.length,
      },
      'Scan complete'
    );

    return {
      projectPath,
      outputPath,
      files: results.map((r) => r.record),
      summary,
      sideBySide,
    };
  }

  /**
   * Run up to maxConcurrentFiles files at once. Each result lands at its
   * file's index.
   */
  private async processWithConcurrency(
    files: readonly string[],
    projectPath: string,
    outputPath: string
  ): Promise<FileResult[]> {
    const results: FileResult[] = new Array<FileResult>(files.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < files.length) {
        const index = next;
        next += 1;
        const file = files[index];
        if (file === undefined) continue;
        results[index] = await this.processFile(file, projectPath, outputPath);
      }
    };

    const concurrency = Math.min(this.config.maxConcurrentFiles, files.length);
    const inflight: Promise<void>[] = [];
    for (let i = 0; i < concurrency; i++) {
      inflight.push(worker());
    }
    await Promise.all(inflight);

    return results;
  }

  private async processFile(
    relativePath: string,
    projectPath: string,
    outputPath: string
  ): Promise<FileResult> {
    const kind = detectFileKind(relativePath);
    try {
      const target = join(outputPath, relativePath);
      const check = validateOutputPath(outputPath, target);
      if (!check.valid) {
        throw new ProjectPathError(target, check.error ?? 'Invalid output path');
      }
      await mkdir(dirname(target), { recursive: true });

      const source = join(projectPath, relativePath);
      if (kind === 'other') {
        await copyFile(source, target);
        return { record: { relativePath, kind, changes: [] } };
      }

      const original = decodeText(await readFile(source), relativePath);
      const modernized = this.applier.modernize(relativePath, original);
      await writeFile(target, modernized.content, 'utf-8');

      const report = this.engine.compare(original, modernized.content, relativePath);
      return {
        record: { relativePath, kind, changes: modernized.changes },
        outcome: { ok: true, report },
        rows: modernized.changed
          ? this.engine.sideBySide(original, modernized.content, relativePath)
          : undefined,
      };
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error({ file: relativePath, error }, 'File processing failed');
      return {
        record: { relativePath, kind, changes: [], error },
        outcome: { ok: false, failure: { filename: relativePath, error } },
      };
    }
  }
}
