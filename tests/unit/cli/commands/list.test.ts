/**
 * Tests for the list and delete-cache commands.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { createCli } from '../../../../src/cli/index.js';
import { logger } from '../../../../src/utils/logger.js';
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

describe('list commands', () => {
  let project: TestProject;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]): Promise<unknown> =>
    createCli().parseAsync(['node', 'packscan', '--project-root', project.root, ...args]);
  const printed = (): unknown[] => consoleSpy.mock.calls.map((call) => call[0]);

  beforeEach(() => {
    vi.clearAllMocks();
    project = createTestProject({
      ...CHECK_FIXTURE,
      'packs/baz/lib/bar.rb': 'class Bar\nend\n',
    });
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    project.remove();
    vi.restoreAllMocks();
  });

  it('should list packs longest name first with their package.yml', async () => {
    await run('list-packs');

    expect(printed()).toEqual([
      'packs/bar\tpacks/bar/package.yml',
      'packs/baz\tpacks/baz/package.yml',
      'packs/foo\tpacks/foo/package.yml',
      '.\tpackage.yml',
    ]);
  });

  it('should list included files', async () => {
    await run('list-included-files');

    expect(printed()).toEqual([
      'packs/bar/app/services/bar.rb',
      'packs/baz/app/services/baz.rb',
      'packs/baz/lib/bar.rb',
      'packs/foo/app/services/foo.rb',
    ]);
  });

  it('should list every inferred definition by constant name', async () => {
    await run('list-definitions');

    expect(printed()).toEqual([
      '::Bar is defined at packs/bar/app/services/bar.rb',
      '::Bar is defined at packs/baz/lib/bar.rb',
      '::Baz is defined at packs/baz/app/services/baz.rb',
      '::Foo is defined at packs/foo/app/services/foo.rb',
    ]);
  });

  it('should list only constants with several definitions under --ambiguous', async () => {
    await run('list-definitions', '--ambiguous');

    expect(printed()).toEqual([
      '::Bar is defined at packs/bar/app/services/bar.rb',
      '::Bar is defined at packs/baz/lib/bar.rb',
    ]);
  });

  it('should list parsed definitions under the experimental parser', async () => {
    project.write('packs/foo/app/services/foo.rb', 'module Foo\n  LIMIT = 3\nend\n');

    await run('-e', 'list-definitions');

    expect(printed()).toEqual([
      '::Bar is defined at packs/bar/app/services/bar.rb',
      '::Bar is defined at packs/baz/lib/bar.rb',
      '::Baz is defined at packs/baz/app/services/baz.rb',
      '::Foo::LIMIT is defined at packs/foo/app/services/foo.rb',
    ]);
  });
});

describe('delete-cache command', () => {
  let project: TestProject;

  beforeEach(() => {
    vi.clearAllMocks();
    project = createTestProject(CHECK_FIXTURE);
  });

  afterEach(() => {
    project.remove();
  });

  it('should remove the cache directory', async () => {
    project.write('tmp/cache/packwerk/references.json', '{}');

    await createCli().parseAsync(['node', 'packscan', '--project-root', project.root, 'delete-cache']);

    expect(existsSync(project.path('tmp/cache/packwerk'))).toBe(false);
    expect(logger.success).toHaveBeenCalledWith('Deleted tmp/cache/packwerk');
  });
});
