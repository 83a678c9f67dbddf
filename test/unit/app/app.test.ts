import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'node:path';
import { executeScan, selectSkills, type ScanOutcome } from '@/app';
import { buildSkillReport } from '@/report/skill-report';
import { computeExitCode } from '@/report/formatters';
import { loadSkillPacks } from '@/skills/loader';
import { ScanErrorCode } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { Severity } from '@/types';
import { ORDERS_CONTROLLER, PROGRAM_CS } from '../../__support__/utilities/fixtures';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

const logger = createLogger({ level: 'silent' });

describe('executeScan', () => {
  let testDir: string;
  let cleanup: () => Promise<void>;
  let projectDir: string;

  beforeEach(() => {
    const temp = createTestTempDir('app-test-');
    testDir = temp.dir.name;
    cleanup = temp.cleanup;
    projectDir = path.join(testDir, 'project');
    writeTree(projectDir, {
      'Controllers/OrdersController.cs': ORDERS_CONTROLLER,
      'Program.cs': PROGRAM_CS,
      'bin/Debug/Generated.cs': 'var value = task.Result;\n',
    });
  });

  afterEach(async () => {
    await cleanup();
  });

  async function scan(request: Omit<Parameters<typeof executeScan>[0], 'path'> = {}) {
    const outcome = await executeScan({ path: projectDir, ...request }, logger);
    if (!outcome.ok) throw new Error(outcome.error);
    return outcome.value;
  }

  it('should apply the packaged skills to a project', async () => {
    const { result } = await scan();

    expect(
      result.findings.map((f) => `${f.file}:${f.line} ${f.ruleId} ${f.severity}`),
    ).toEqual([
      'Controllers/OrdersController.cs:3 API003 Low',
      'Controllers/OrdersController.cs:4 API001 Medium',
      'Controllers/OrdersController.cs:6 API002 Low',
      'Controllers/OrdersController.cs:8 ASYNC001 High',
      'Controllers/OrdersController.cs:13 ERR001 Medium',
      'Program.cs:2 SEC001 Critical',
      'Program.cs:3 SEC003 High',
      'Program.cs:5 SEC004 Medium',
    ]);
    expect(result.filesScanned).toBe(2);
    expect(result.rulesApplied).toBe(13);
    expect(result.summary).toEqual({ critical: 1, high: 2, medium: 3, low: 2, total: 8 });
    expect(computeExitCode(result)).toBe(1);
  });

  it('should restrict the scan to selected skills', async () => {
    const { result, packs } = await scan({ skills: ['async-practices'] });

    expect(packs.map((pack) => pack.name)).toEqual(['async-practices']);
    expect(result.findings.map((f) => f.ruleId)).toEqual(['ASYNC001']);
    expect(computeExitCode(result)).toBe(0);
    expect(computeExitCode(result, Severity.HIGH)).toBe(1);
  });

  it('should fail for an unknown skill', async () => {
    const outcome = await executeScan({ path: projectDir, skills: ['nope'] }, logger);

    expect(outcome).toMatchObject({
      ok: false,
      error: "Skill 'nope' not found",
      guidance: { code: ScanErrorCode.SKILL_NOT_FOUND },
    });
  });

  it('should fail when a custom skill reuses a packaged rule id', async () => {
    const rulesDir = path.join(testDir, 'rules');
    writeTree(rulesDir, {
      'custom.yaml': [
        'description: Custom rules',
        'rules:',
        '  - id: SEC001',
        '    name: Clash',
        '    severity: low',
        '    pattern: x',
        '    message: m',
        '',
      ].join('\n'),
    });

    const outcome = await executeScan({ path: projectDir, rulePaths: [rulesDir] }, logger);

    expect(outcome).toMatchObject({
      ok: false,
      error: 'Duplicate rule id SEC001 (skills: secrets-and-cors, custom)',
      guidance: { code: ScanErrorCode.DUPLICATE_RULE },
    });
  });

  it('should fail with PathNotFound for a missing project', async () => {
    const missing = path.join(testDir, 'missing');

    const outcome = await executeScan({ path: missing }, logger);

    expect(outcome).toMatchObject({
      ok: false,
      error: `Path not found: ${missing}`,
      guidance: { code: ScanErrorCode.PATH_NOT_FOUND },
    });
  });

  describe('selectSkills', () => {
    it('should keep every skill when none are named and drop repeats', () => {
      const loaded = loadSkillPacks({ logger });
      if (!loaded.ok) throw new Error(loaded.error);

      const all = selectSkills(loaded.value);
      const repeated = selectSkills(loaded.value, ['secrets-and-cors', 'Secrets-And-Cors']);

      expect(all.ok && all.value.length).toBe(4);
      expect(repeated.ok && repeated.value.map((pack) => pack.name)).toEqual([
        'secrets-and-cors',
      ]);
    });
  });

  describe('buildSkillReport', () => {
    it('should group findings by skill', async () => {
      const outcome: ScanOutcome = await scan();

      const report = buildSkillReport(outcome, new Date('2026-01-15T10:00:00.000Z'));

      expect(report.generatedAt).toBe('2026-01-15T10:00:00.000Z');
      expect(report.projectPath).toBe(projectDir);
      expect(
        report.results.map((entry) => [entry.skill, entry.issues.map((issue) => issue.ruleId)]),
      ).toEqual([
        ['controller-conventions', ['API003', 'API001', 'API002']],
        ['exception-handling', ['ERR001']],
        ['async-practices', ['ASYNC001']],
        ['secrets-and-cors', ['SEC001', 'SEC003', 'SEC004']],
      ]);
      expect(report.diagnostics).toEqual([]);
      expect(report.summary).toEqual({
        totalSkillsChecked: 4,
        totalIssues: 8,
        criticalIssues: 1,
        highIssues: 2,
      });
    });

    it('should list scanner diagnostics separately', async () => {
      writeTree(projectDir, { 'Blob.cs': 'MZ\u0000' });

      const report = buildSkillReport(await scan(), new Date('2026-01-15T10:00:00.000Z'));

      expect(report.diagnostics.map((d) => `${d.file} ${d.ruleId}`)).toEqual(['Blob.cs SCAN001']);
      expect(report.summary.totalIssues).toBe(9);
      const grouped = report.results.reduce((count, entry) => count + entry.issues.length, 0);
      expect(grouped + report.diagnostics.length).toBe(report.summary.totalIssues);
    });
  });
});
