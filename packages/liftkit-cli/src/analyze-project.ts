/**
 * Read-only analysis of every configuration, build and source file in a
 * project.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { analyzeConfigFile, configFileType } from '@liftkit/rewrite-rules';
import type { ConfigAnalysis } from '@liftkit/rewrite-rules';
import type { ProjectWalker } from './walker.js';

export interface FileAnalysis {
  relativePath: string;
  analysis: ConfigAnalysis;
}

/**
 * Analyze the files a walker discovers under `projectPath`. Files without
 * findings are left out; unreadable files are reported as an error finding.
 */
export async function analyzeProject(
  walker: ProjectWalker,
  projectPath: string,
  logger: Logger
): Promise<FileAnalysis[]> {
  const log = logger.child({ component: 'project-analyzer' });
  const findings: FileAnalysis[] = [];

  for (const relativePath of await walker.discoverFiles(projectPath)) {
    const fileType = configFileType(relativePath);
    if (fileType === null) continue;

    let content: string;
    try {
      content = await readFile(join(projectPath, relativePath), 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn({ file: relativePath, error: message }, 'Could not read file');
      findings.push({
        relativePath,
        analysis: {
          fileType,
          issues: [{ severity: 'error', message: `Failed to read file: ${message}` }],
          recommendations: [],
        },
      });
      continue;
    }

    const analysis = analyzeConfigFile(relativePath, content);
    if (analysis === null) continue;
    if (analysis.issues.length === 0 && analysis.recommendations.length === 0) continue;

    log.debug(
      { file: relativePath, issues: analysis.issues.length, recommendations: analysis.recommendations.length },
      'File analyzed'
    );
    findings.push({ relativePath, analysis });
  }

  return findings;
}
