/**
 * Tests for pack discovery.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  findPackageYmls,
  listIncludedFiles,
  loadPackSet,
  owningPackageYmlForFiles,
} from '../../../../src/core/packs/discovery.js';
import { resolveConfiguration } from '../../../../src/core/config/loader.js';
import { PackSetError } from '../../../../src/utils/errors.js';
import { createTestProject, type TestProject } from '../../../helpers/project.js';

describe('owningPackageYmlForFiles', () => {
  it('should pick the closest enclosing package.yml', () => {
    const owning = owningPackageYmlForFiles(
      '/project',
      ['/project/packs/foo/app/a.rb', '/project/packs/foo/nested/b.rb', '/project/lib/c.rb'],
      ['/project/package.yml', '/project/packs/foo/package.yml', '/project/packs/foo/nested/package.yml']
    );

    expect(owning).toEqual(
      new Map([
        ['/project/packs/foo/app/a.rb', '/project/packs/foo/package.yml'],
        ['/project/packs/foo/nested/b.rb', '/project/packs/foo/nested/package.yml'],
        ['/project/lib/c.rb', '/project/package.yml'],
      ])
    );
  });

  it('should leave files outside every pack unowned', () => {
    const owning = owningPackageYmlForFiles('/project', ['/project/lib/c.rb'], ['/project/packs/foo/package.yml']);

    expect(owning.size).toBe(0);
  });
});

describe('discovery on disk', () => {
  let project: TestProject;

  beforeEach(() => {
    project = createTestProject({
      'package.yml': '',
      'packs/foo/package.yml': '',
      'packs/foo/app/models/foo.rb': 'class Foo\nend\n',
      'packs/foo/lib/tasks/foo.rake': 'Foo\n',
      'vendor/gems/bar/package.yml': '',
      'vendor/gems/bar/bar.rb': 'Bar\n',
      'node_modules/x/package.yml': '',
      'README.md': '# readme\n',
    });
  });

  afterEach(() => {
    project.remove();
  });

  it('should find package.yml files outside excluded directories', async () => {
    const config = await resolveConfiguration(project.root);

    expect(await findPackageYmls(config)).toEqual([
      project.path('package.yml'),
      project.path('packs/foo/package.yml'),
    ]);
  });

  it('should only search the configured package paths', async () => {
    project.write('packwerk.yml', 'package_paths:\n- other/*\n');
    const config = await resolveConfiguration(project.root);

    expect(await findPackageYmls(config)).toEqual([project.path('package.yml')]);
  });

  it('should list included Ruby and rake files', async () => {
    const config = await resolveConfiguration(project.root);

    expect(await listIncludedFiles(config)).toEqual([
      project.path('packs/foo/app/models/foo.rb'),
      project.path('packs/foo/lib/tasks/foo.rake'),
    ]);
  });

  it('should build a pack set owning the included files', async () => {
    const config = await resolveConfiguration(project.root);
    const files = await listIncludedFiles(config);

    const packSet = await loadPackSet(config, files);

    expect(packSet.packs.map((p) => p.name)).toEqual(['packs/foo', '.']);
    expect(packSet.forFile(project.path('packs/foo/app/models/foo.rb'))?.name).toBe('packs/foo');
  });

  it('should fail without a root package.yml', async () => {
    const other = createTestProject({ 'packs/foo/package.yml': '' });
    try {
      const config = await resolveConfiguration(other.root);
      await expect(loadPackSet(config, [])).rejects.toBeInstanceOf(PackSetError);
    } finally {
      other.remove();
    }
  });
});
