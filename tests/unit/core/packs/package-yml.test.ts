/**
 * Tests for package.yml loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  formatPackageYml,
  loadPack,
  normalizePackageYml,
  packNameForYml,
} from '../../../../src/core/packs/package-yml.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';
import { createTestProject, type TestProject } from '../../../helpers/project.js';

describe('packNameForYml', () => {
  it('should name the root pack .', () => {
    expect(packNameForYml('/project', '/project/package.yml')).toBe('.');
  });

  it('should name other packs by their relative directory', () => {
    expect(packNameForYml('/project', '/project/packs/foo/package.yml')).toBe('packs/foo');
  });
});

describe('loadPack', () => {
  let project: TestProject;

  beforeEach(() => {
    project = createTestProject();
  });

  afterEach(() => {
    project.remove();
  });

  it('should default every setting of an empty package.yml', async () => {
    const yml = project.write('packs/foo/package.yml', '');

    expect(await loadPack(project.root, yml)).toEqual({
      name: 'packs/foo',
      yml,
      directory: project.path('packs/foo'),
      enforceDependencies: false,
      enforcePrivacy: false,
      dependencies: [],
      ignoredDependencies: [],
      publicPath: 'app/public',
      metadata: {},
      recordedViolations: [],
    });
  });

  it('should read settings and treat strict as enabled', async () => {
    const yml = project.write(
      'packs/foo/package.yml',
      [
        'enforce_dependencies: strict',
        'enforce_privacy: true',
        'dependencies:',
        '- packs/bar',
        'ignored_dependencies:',
        '- packs/legacy',
        'public_path: app/api/',
        'metadata:',
        '  owner: team-a',
        '',
      ].join('\n')
    );

    const pack = await loadPack(project.root, yml);

    expect(pack.enforceDependencies).toBe(true);
    expect(pack.enforcePrivacy).toBe(true);
    expect(pack.dependencies).toEqual(['packs/bar']);
    expect(pack.ignoredDependencies).toEqual(['packs/legacy']);
    expect(pack.publicPath).toBe('app/api');
    expect(pack.metadata).toEqual({ owner: 'team-a' });
  });

  it('should read the recorded violations beside it', async () => {
    const yml = project.write('packs/foo/package.yml', 'enforce_dependencies: true\n');
    project.write(
      'packs/foo/package_todo.yml',
      'packs/bar:\n  "::Bar":\n    violations:\n    - dependency\n    files:\n    - packs/foo/a.rb\n'
    );

    const pack = await loadPack(project.root, yml);

    expect(pack.recordedViolations).toEqual([
      {
        violationType: 'dependency',
        file: 'packs/foo/a.rb',
        constantName: '::Bar',
        referencingPackName: 'packs/foo',
        definingPackName: 'packs/bar',
      },
    ]);
  });

  it('should reject invalid settings', async () => {
    const yml = project.write('package.yml', 'enforce_privacy: sometimes\n');

    await expect(loadPack(project.root, yml)).rejects.toMatchObject({
      code: ErrorCodes.INVALID_PACKAGE_YML,
    });
    await expect(loadPack(project.root, yml)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('normalizePackageYml', () => {
  it('should put known keys first and the rest alphabetically', () => {
    const normalized = normalizePackageYml({
      owner: 'team-a',
      metadata: { area: 'billing' },
      dependencies: ['packs/b', 'packs/a', 'packs/b'],
      enforce_privacy: 'strict',
      layer: 'core',
    });

    expect(Object.keys(normalized)).toEqual(['enforce_privacy', 'dependencies', 'metadata', 'layer', 'owner']);
    expect(normalized['dependencies']).toEqual(['packs/a', 'packs/b']);
    expect(normalized['enforce_privacy']).toBe('strict');
  });

  it('should keep lists that are not pack names as written', () => {
    expect(normalizePackageYml({ dependencies: ['packs/b', 1] })).toEqual({ dependencies: ['packs/b', 1] });
  });

  it('should format block sequences without extra indentation', () => {
    expect(formatPackageYml({ dependencies: ['packs/b', 'packs/a'], enforce_dependencies: true })).toBe(
      'enforce_dependencies: true\ndependencies:\n- packs/a\n- packs/b\n'
    );
  });
});
