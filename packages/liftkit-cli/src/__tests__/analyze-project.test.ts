import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { analyzeProject } from '../analyze-project.js';
import { buildCliConfig } from '../config.js';
import { ProjectWalker } from '../walker.js';

const logger = pino({ level: 'silent' });

describe('analyzeProject', () => {
  let projectPath: string;

  beforeEach(async () => {
    projectPath = await mkdtemp(join(tmpdir(), 'liftkit-test-analyze-'));
    await mkdir(join(projectPath, 'src/main/java'), { recursive: true });
    await mkdir(join(projectPath, 'src/main/resources'), { recursive: true });
    await writeFile(
      join(projectPath, 'pom.xml'),
      '<project><properties><java.version>11</java.version></properties></project>\n'
    );
    await writeFile(join(projectPath, 'src/main/java/App.java'), 'import javax.a.B;\nclass App {}\n');
    await writeFile(join(projectPath, 'src/main/resources/application.properties'), 'server.port=8080\n');
    await writeFile(join(projectPath, 'README.md'), '# readme\n');
  });

  afterEach(async () => {
    await rm(projectPath, { recursive: true, force: true });
  });

  it('returns findings for files that have any, in discovery order', async () => {
    const walker = new ProjectWalker(logger, buildCliConfig());

    const findings = await analyzeProject(walker, projectPath, logger);

    expect(findings.map((f) => [f.relativePath, f.analysis.fileType])).toEqual([
      ['pom.xml', 'pom.xml'],
      ['src/main/java/App.java', 'java'],
    ]);
    expect(findings[0]?.analysis.recommendations.map((r) => r.message)).toEqual([
      'Update Java version from 11 to 21',
    ]);
    expect(findings[1]?.analysis.recommendations.map((r) => r.message)).toEqual([
      'Migrate 1 javax.* import to jakarta.*',
    ]);
  });
});
