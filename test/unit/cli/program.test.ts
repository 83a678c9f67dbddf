import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getBuiltInSkillsPath } from '@/skills/loader';
import { FIXED_NOW, runCli } from '../../__support__/utilities/cli-harness';
import {
  MARKER_PACK,
  MARKER_SOURCES,
  ORDERS_CONTROLLER,
  PROGRAM_CS,
} from '../../__support__/utilities/fixtures';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('skill-scan CLI', () => {
  let testDir: string;
  let cleanup: () => Promise<void>;
  let markersProject: string;
  let rulesDir: string;
  let webProject: string;

  beforeEach(() => {
    const temp = createTestTempDir('cli-test-');
    testDir = temp.dir.name;
    cleanup = temp.cleanup;
    markersProject = path.join(testDir, 'markers');
    rulesDir = path.join(testDir, 'rules');
    webProject = path.join(testDir, 'web');
    writeTree(markersProject, MARKER_SOURCES);
    writeTree(rulesDir, { 'markers.yaml': MARKER_PACK });
    writeTree(webProject, {
      'Controllers/OrdersController.cs': ORDERS_CONTROLLER,
      'Program.cs': PROGRAM_CS,
    });
  });

  afterEach(async () => {
    await cleanup();
  });

  const markerArgs = (): string[] => ['--no-built-in', '--rules', rulesDir];

  describe('scan', () => {
    it('should scan with the default command and exit 1 on a Critical finding', async () => {
      const run = await runCli(['--path', markersProject, ...markerArgs()]);

      expect(run.stdout).toBe(
        [
          'Scan Results',
          '============',
          '',
          'Critical: 1',
          'High: 1',
          'Medium: 1',
          'Low: 0',
          'Total: 3',
          '',
          '[High] MARK002 A.cs:1 - High marker found',
          '[Critical] MARK001 C.cs:1 - Critical marker found',
          '[Medium] MARK003 C.cs:2 - Medium marker found',
          '',
        ].join('\n'),
      );
      expect(run.stderr).toEqual([]);
      expect(run.exitCode).toBe(1);
    });

    it('should emit JSON on request', async () => {
      const run = await runCli(['scan', '-p', markersProject, ...markerArgs(), '-o', 'json']);
      const report: unknown = JSON.parse(run.stdout);

      expect(report).toMatchObject({
        root: markersProject,
        summary: { critical: 1, high: 1, medium: 1, low: 0, total: 3 },
      });
      expect(run.exitCode).toBe(1);
    });

    it('should emit Markdown on request', async () => {
      const run = await runCli(['scan', '-p', markersProject, ...markerArgs(), '-o', 'markdown']);

      expect(run.stdout.startsWith('# Scan Report\n\n')).toBe(true);
      expect(run.stdout).toContain('\n| **Total** | **3** |\n');
    });

    it('should exit 0 below the fail-on severity and 1 at it', async () => {
      await fs.rm(path.join(markersProject, 'C.cs'));

      const lenient = await runCli(['scan', '-p', markersProject, ...markerArgs()]);
      const strict = await runCli([
        'scan',
        '-p',
        markersProject,
        '--fail-on',
        'high',
        ...markerArgs(),
      ]);
      const fromEnv = await runCli(['scan', '-p', markersProject, ...markerArgs()], {
        SKILL_SCAN_FAIL_ON: 'high',
      });

      expect(lenient.exitCode).toBe(0);
      expect(strict.exitCode).toBe(1);
      expect(fromEnv.exitCode).toBe(1);
    });

    it('should report a missing path and exit 1', async () => {
      const missing = path.join(testDir, 'missing');

      const run = await runCli(['scan', '-p', missing, ...markerArgs()]);

      expect(run.stdout).toBe('');
      expect(run.stderr[0]).toBe(`❌ Error: Path not found: ${missing}`);
      expect(run.stderr).toContain('\n💡 Scan root issue:');
      expect(run.exitCode).toBe(1);
    });

    it('should reject an unknown output format before scanning', async () => {
      const run = await runCli(['scan', '-p', path.join(testDir, 'missing'), '-o', 'xml']);

      expect(run.stdout).toBe('');
      expect(run.stderr[0]).toBe('❌ Error: Unknown output format: xml');
      expect(run.exitCode).toBe(1);
    });

    it('should reject invalid configuration from the environment', async () => {
      const run = await runCli(['scan', '-p', markersProject], { SKILL_SCAN_CONCURRENCY: '0' });

      expect(run.stderr[0]?.startsWith('❌ Error: Invalid configuration:')).toBe(true);
      expect(run.exitCode).toBe(1);
    });

    it('should reject an invalid concurrency option', async () => {
      const run = await runCli(['scan', '-p', markersProject, '--concurrency', 'many']);

      expect(run.stderr[0]).toBe('❌ Error: Invalid concurrency: many');
      expect(run.exitCode).toBe(1);
    });

    it('should apply the packaged skills by default', async () => {
      const run = await runCli(['scan', '-p', webProject]);

      expect(run.stdout).toContain('Total: 8\n');
      expect(run.stdout).toContain(
        '[Critical] SEC001 Program.cs:2 - Connection string contains a hardcoded password\n',
      );
      expect(run.exitCode).toBe(1);
    });
  });

  describe('check', () => {
    it('should run a single skill', async () => {
      const run = await runCli(['check', 'async-practices', '-p', webProject]);

      expect(run.stdout).toContain('Total: 1\n');
      expect(run.stdout).toContain(
        '[High] ASYNC001 Controllers/OrdersController.cs:8 - ' +
          'Blocking on a task can deadlock and starves the thread pool\n',
      );
      expect(run.exitCode).toBe(0);
    });

    it('should fail for an unknown skill', async () => {
      const run = await runCli(['check', 'no-such-skill', '-p', webProject]);

      expect(run.stdout).toBe('');
      expect(run.stderr[0]).toBe("❌ Error: Skill 'no-such-skill' not found");
      expect(run.exitCode).toBe(1);
    });
  });

  describe('report', () => {
    it('should write the grouped report to a file', async () => {
      const output = path.join(testDir, 'report.json');

      const run = await runCli(['report', '-p', webProject, '--output', output]);
      const report: unknown = JSON.parse(await fs.readFile(output, 'utf-8'));

      expect(run.stdout).toBe('');
      expect(run.stderr).toEqual([
        `✅ Report saved to ${output}`,
        '',
        'Skills Checked: 4',
        'Total Issues: 8',
        'Critical Issues: 1',
        'High Issues: 2',
      ]);
      expect(report).toMatchObject({
        generatedAt: FIXED_NOW.toISOString(),
        projectPath: webProject,
        summary: { totalSkillsChecked: 4, totalIssues: 8, criticalIssues: 1, highIssues: 2 },
      });
      expect(run.exitCode).toBe(1);
    });

    it('should print the report to stdout without --output', async () => {
      const run = await runCli(['report', '-p', markersProject, ...markerArgs()]);
      const report: unknown = JSON.parse(run.stdout);

      expect(report).toMatchObject({
        results: [{ skill: 'markers', category: 'general' }],
        diagnostics: [],
      });
      expect(run.stderr.slice(1)).toEqual([
        'Skills Checked: 1',
        'Total Issues: 3',
        'Critical Issues: 1',
        'High Issues: 1',
      ]);
    });
  });

  describe('list', () => {
    it('should print a table of the packaged skills', async () => {
      const run = await runCli(['list']);

      expect(run.stdout.split('\n')).toEqual([
        'Category        Skill                   Priority  Description',
        '--------------  ----------------------  --------  --------------------------------------------------',
        'api-design      controller-conventions  Medium    Controller conventions for ASP.NET Core Web API...',
        'error-handling  exception-handling      Medium    Exception handling that keeps stack traces and ...',
        'performance     async-practices         High      Async/await usage that avoids thread-pool starv...',
        'security        secrets-and-cors        Critical  Keeps credentials out of source and CORS polici...',
        '',
      ]);
      expect(run.exitCode).toBe(0);
    });

    it('should filter by category', async () => {
      const run = await runCli(['list', '--category', 'Security']);

      expect(run.stdout).toBe(
        [
          'Category  Skill             Priority  Description',
          '--------  ----------------  --------  --------------------------------------------------',
          'security  secrets-and-cors  Critical  Keeps credentials out of source and CORS polici...',
          '',
        ].join('\n'),
      );
    });

    it('should say when no skill matches', async () => {
      const run = await runCli(['list', '--category', 'testing']);

      expect(run.stdout).toBe('No skills found.\n');
      expect(run.exitCode).toBe(0);
    });
  });

  describe('info', () => {
    it('should describe a skill and its rules', async () => {
      const run = await runCli(['info', 'secrets-and-cors']);
      const source = path.join(getBuiltInSkillsPath(), 'security', 'secrets-and-cors.yaml');

      expect(run.stdout).toBe(
        [
          'Skill: secrets-and-cors',
          '',
          'Description: Keeps credentials out of source and CORS policies narrow.',
          'Version: 1.0.0',
          'Priority: Critical',
          'Category: security',
          'Categories: security',
          `Source: ${source}`,
          '',
          'Use when:',
          '  • Configuring authentication, data access or CORS',
          '  • Reviewing code before a release',
          '',
          'Rules:',
          '  • SEC001 [Critical] Hardcoded password in connection string',
          '      Fix: Read connection strings from configuration, user secrets or a key vault',
          '  • SEC002 [Critical] Hardcoded signing key',
          '      Fix: Load the signing key from configuration',
          '  • SEC003 [High] CORS allows any origin',
          '      Fix: List the trusted origins with WithOrigins(...)',
          '  • SEC004 [Medium] Developer exception page enabled unconditionally',
          '      Fix: Wrap UseDeveloperExceptionPage() in if (app.Environment.IsDevelopment())',
          '',
        ].join('\n'),
      );
      expect(run.exitCode).toBe(0);
    });

    it('should fail for an unknown skill', async () => {
      const run = await runCli(['info', 'nope']);

      expect(run.stderr[0]).toBe("❌ Error: Skill 'nope' not found");
      expect(run.stderr).toContain('  • List available skills: skill-scan list');
      expect(run.exitCode).toBe(1);
    });
  });
});
