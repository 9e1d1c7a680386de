/**
 * Project configuration loader.
 *
 * Reads the optional `.liftkit.yaml` at a project root. Values found there
 * take precedence over environment variables.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { CliConfig } from './types.js';

export const PROJECT_CONFIG_FILE = '.liftkit.yaml';

export const ProjectConfigSchema = z
  .object({
    ignoredDirs: z.array(z.string().min(1)).optional(),
    contextLines: z.number().int().min(0).optional(),
    topFiles: z.number().int().min(1).optional(),
    legacyNamespace: z.string().min(1).optional(),
    targetNamespace: z.string().min(1).optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/** Validation error from config loading */
export interface ConfigValidationError {
  field: string;
  message: string;
}

/** Result of loading project config */
export type ConfigLoadResult =
  | { success: true; config: ProjectConfig }
  | { success: false; errors: ConfigValidationError[] };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Parse and validate project configuration from a YAML string.
 * Empty content yields an empty config.
 */
export function loadProjectConfigFromString(yamlContent: string): ConfigLoadResult {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: `Failed to parse YAML: ${errorMessage(err)}` }],
    };
  }

  if (parsed === undefined || parsed === null) {
    return { success: true, config: {} };
  }

  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : 'yaml',
        message: issue.message,
      })),
    };
  }

  return { success: true, config: result.data };
}

/**
 * Load `.liftkit.yaml` from a project root. A missing file yields an empty config.
 */
export async function loadProjectConfig(projectPath: string): Promise<ConfigLoadResult> {
  let raw: string;
  try {
    raw = await readFile(join(projectPath, PROJECT_CONFIG_FILE), 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      return { success: true, config: {} };
    }
    return {
      success: false,
      errors: [{ field: 'filePath', message: `Failed to read config file: ${errorMessage(err)}` }],
    };
  }
  return loadProjectConfigFromString(raw);
}

/**
 * Overlay project settings on a CLI config. Ignored directories are merged.
 */
export function applyProjectConfig(config: CliConfig, project: ProjectConfig): CliConfig {
  return {
    ...config,
    ignoredDirs: [...new Set([...config.ignoredDirs, ...(project.ignoredDirs ?? [])])],
    contextLines: project.contextLines ?? config.contextLines,
    topFiles: project.topFiles ?? config.topFiles,
    legacyNamespace: project.legacyNamespace ?? config.legacyNamespace,
    targetNamespace: project.targetNamespace ?? config.targetNamespace,
  };
}
