/**
 * Tests for the check and check-contents commands.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createCli } from '../../../../src/cli/index.js';
import { readStdin } from '../../../../src/cli/commands/shared.js';
import { logger } from '../../../../src/utils/logger.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';
import { CHECK_FIXTURE, createTestProject, type TestProject } from '../../../helpers/project.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    setLevel: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
  },
}));

vi.mock('../../../../src/cli/commands/shared.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/cli/commands/shared.js')>();
  return { ...actual, readStdin: vi.fn() };
});

const EXPECTED_MESSAGES = [
  'dependency: packs/foo/app/services/foo.rb:3 references ::Bar from packs/bar without an explicit dependency in packs/foo/package.yml',
  'privacy: packs/foo/app/services/foo.rb:3 references private constant ::Bar from packs/bar',
  'privacy: packs/foo/app/services/foo.rb:7 references private constant ::Baz from packs/baz',
];

describe('check command', () => {
  let project: TestProject;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]): Promise<unknown> =>
    createCli().parseAsync(['node', 'packscan', '--project-root', project.root, ...args]);

  beforeEach(() => {
    vi.clearAllMocks();
    project = createTestProject(CHECK_FIXTURE);
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    project.remove();
    vi.restoreAllMocks();
  });

  it('should print the report and exit 1 when violations are found', async () => {
    await expect(run('check')).rejects.toThrow('process.exit(1)');

    expect(consoleSpy).toHaveBeenCalledWith(['3 violation(s) detected:', ...EXPECTED_MESSAGES].join('\n'));
  });

  it('should exit normally when the checked files are clean', async () => {
    await run('check', 'packs/bar/app/services/bar.rb');

    expect(consoleSpy).toHaveBeenCalledWith('No violations detected!');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should print a JSON report', async () => {
    await expect(run('check', '--format', 'json')).rejects.toThrow('process.exit(1)');

    expect(JSON.parse(String(consoleSpy.mock.calls[0][0]))).toMatchObject({
      passed: false,
      summary: { filesChecked: 3, referencesAnalyzed: 2, violationCount: 3 },
    });
  });

  it('should reject an unknown format before analyzing', async () => {
    await expect(run('check', '--format', 'xml')).rejects.toThrow('process.exit(1)');

    expect(logger.error).toHaveBeenCalledWith("Unknown format 'xml', expected human or json");
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it('should report a missing root pack with its error code and exit 1', async () => {
    project.remove();
    project = createTestProject({ 'packs/foo/package.yml': 'enforce_privacy: true\n' });

    await expect(run('--no-cache', 'check')).rejects.toThrow('process.exit(1)');

    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining(`[${ErrorCodes.NO_ROOT_PACK}]`));
  });

  it('should resolve constants from parsed definitions under the experimental parser', async () => {
    project.remove();
    const fixture = Object.fromEntries(
      Object.entries(CHECK_FIXTURE).filter(([file]) => file !== 'packs/bar/app/services/bar.rb')
    );
    project = createTestProject({
      ...fixture,
      'packs/bar/app/services/registry.rb': 'class Bar\n  def call\n    1\n  end\nend\n',
    });

    await expect(run('check')).rejects.toThrow('process.exit(1)');
    expect(consoleSpy).toHaveBeenLastCalledWith(['1 violation(s) detected:', EXPECTED_MESSAGES[2]].join('\n'));

    await expect(run('--experimental-parser', 'check')).rejects.toThrow('process.exit(1)');
    expect(consoleSpy).toHaveBeenLastCalledWith(['3 violation(s) detected:', ...EXPECTED_MESSAGES].join('\n'));
  });
});

describe('check-contents command', () => {
  let project: TestProject;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]): Promise<unknown> =>
    createCli().parseAsync(['node', 'packscan', '--project-root', project.root, ...args]);

  beforeEach(() => {
    vi.clearAllMocks();
    project = createTestProject(CHECK_FIXTURE);
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    project.remove();
    vi.restoreAllMocks();
  });

  it('should check piped contents in place of the file on disk', async () => {
    vi.mocked(readStdin).mockResolvedValue('Bar.new\n');

    await expect(run('check-contents', 'packs/foo/app/services/foo.rb')).rejects.toThrow('process.exit(1)');

    expect(consoleSpy).toHaveBeenCalledWith(
      [
        '2 violation(s) detected:',
        'dependency: packs/foo/app/services/foo.rb:1 references ::Bar from packs/bar without an explicit dependency in packs/foo/package.yml',
        'privacy: packs/foo/app/services/foo.rb:1 references private constant ::Bar from packs/bar',
      ].join('\n')
    );
  });

  it('should check contents for a file that does not exist yet', async () => {
    vi.mocked(readStdin).mockResolvedValue('module Foo\n  Baz.new\nend\n');

    await expect(run('check-contents', 'packs/foo/app/services/draft.rb')).rejects.toThrow('process.exit(1)');

    expect(consoleSpy).toHaveBeenCalledWith(
      [
        '1 violation(s) detected:',
        'privacy: packs/foo/app/services/draft.rb:2 references private constant ::Baz from packs/baz',
      ].join('\n')
    );
  });

  it('should pass clean contents', async () => {
    vi.mocked(readStdin).mockResolvedValue('class Foo\nend\n');

    await run('check-contents', 'packs/foo/app/services/foo.rb');

    expect(consoleSpy).toHaveBeenCalledWith('No violations detected!');
  });
});
