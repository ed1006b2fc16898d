/**
 * Constant resolution.
 *
 * By default constants are inferred from file layout: files under an
 * autoload root of their pack define the constant their path spells, so
 * `<pack>/app/services/foo/bar_baz.rb` defines `::Foo::BarBaz`. Autoload
 * roots are every `app/<dir>/`, every `app/<dir>/concerns/` and `lib/`.
 *
 * The experimental parser instead takes the classes and constant
 * assignments the extractor found in each file.
 */
import * as path from 'node:path';
import type { Reference } from '../../parser/types.js';
import type { PackSet } from '../packs/pack-set.js';
import type { FileReferences } from '../scanner/types.js';
import { camelize } from '../../utils/string.js';
import { toRelative } from '../../utils/file-system.js';
import type { ConstantDefinition } from './types.js';

const RUBY_EXTENSION = '.rb';

/**
 * Path of `file` inside its autoload root, without extension, or null if
 * the file is not autoloaded. `pathInPack` uses forward slashes.
 */
export function autoloadRelativePath(pathInPack: string): string | null {
  if (!pathInPack.endsWith(RUBY_EXTENSION)) return null;
  const segments = pathInPack.slice(0, -RUBY_EXTENSION.length).split('/');

  if (segments[0] === 'lib' && segments.length > 1) {
    return segments.slice(1).join('/');
  }
  if (segments[0] === 'app' && segments.length > 2) {
    const rootDepth = segments[2] === 'concerns' && segments.length > 3 ? 3 : 2;
    return segments.slice(rootDepth).join('/');
  }
  return null;
}

/**
 * `foo/bar_baz` → `::Foo::BarBaz`
 */
export function constantNameForPath(autoloadPath: string): string {
  return autoloadPath
    .split('/')
    .map((segment) => `::${camelize(segment)}`)
    .join('');
}

function stripRootPrefix(name: string): string {
  return name.startsWith('::') ? name.slice(2) : name;
}

/**
 * Candidate fully-qualified names of a reference, in Ruby lookup order:
 * each enclosing namespace innermost first, then the top level.
 */
export function lookupCandidates(reference: Pick<Reference, 'name' | 'moduleNesting'>): string[] {
  if (reference.name.startsWith('::')) {
    return [reference.name];
  }
  return [
    ...reference.moduleNesting.map((nesting) => `::${stripRootPrefix(nesting)}::${reference.name}`),
    `::${reference.name}`,
  ];
}

export class ConstantResolver {
  private readonly definitions = new Map<string, ConstantDefinition[]>();

  /** Definitions are kept in the order given; the first of a name wins. */
  private constructor(definitions: Iterable<ConstantDefinition>) {
    for (const definition of definitions) {
      const existing = this.definitions.get(definition.constantName);
      if (existing) {
        existing.push(definition);
      } else {
        this.definitions.set(definition.constantName, [definition]);
      }
    }
  }

  /**
   * Infer one constant per autoloaded file.
   *
   * @param files - absolute paths of every analyzed file, in path order
   * @param packSet - used to find the pack directory each file is relative to
   */
  static fromFileLayout(projectRoot: string, files: readonly string[], packSet: PackSet): ConstantResolver {
    const definitions: ConstantDefinition[] = [];
    for (const file of files) {
      const pack = packSet.forFile(file);
      if (!pack) continue;

      const pathInPack = path.relative(pack.directory, file).split(path.sep).join('/');
      const autoloadPath = autoloadRelativePath(pathInPack);
      if (autoloadPath === null) continue;

      definitions.push({
        constantName: constantNameForPath(autoloadPath),
        file,
        relativePath: toRelative(projectRoot, file),
      });
    }
    return new ConstantResolver(definitions);
  }

  /**
   * Use the definitions extracted from each file. A file defining one
   * constant twice counts once.
   *
   * @param files - scan results of every analyzed file, in path order
   */
  static fromDefinitions(files: readonly FileReferences[]): ConstantResolver {
    const definitions: ConstantDefinition[] = [];
    for (const fileReferences of files) {
      const seen = new Set<string>();
      for (const definition of fileReferences.definitions) {
        const constantName = `::${stripRootPrefix(definition.fullyQualifiedName)}`;
        if (seen.has(constantName)) continue;
        seen.add(constantName);
        definitions.push({
          constantName,
          file: fileReferences.file,
          relativePath: fileReferences.relativePath,
        });
      }
    }
    return new ConstantResolver(definitions);
  }

  /**
   * The definition a reference denotes, or null for constants defined
   * outside the analyzed files (gems, the standard library). When several
   * files define one constant the first in path order wins.
   */
  resolve(reference: Pick<Reference, 'name' | 'moduleNesting'>): ConstantDefinition | null {
    for (const candidate of lookupCandidates(reference)) {
      const found = this.definitions.get(candidate);
      if (found && found.length > 0) {
        return found[0];
      }
    }
    return null;
  }

  /**
   * Every known definition, sorted by constant name.
   */
  allDefinitions(): Array<{ constantName: string; definitions: ConstantDefinition[] }> {
    return [...this.definitions.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([constantName, definitions]) => ({ constantName, definitions }));
  }
}
