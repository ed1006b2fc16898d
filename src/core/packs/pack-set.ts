/**
 * Pack ownership index.
 *
 * Built once per run from every discovered pack and the nearest
 * package.yml of every analyzed file; read-only afterwards.
 */
import { PackSetError, ErrorCodes } from '../../utils/errors.js';
import { ROOT_PACK_NAME, type Pack } from './types.js';
import { ViolationSet } from './violation-set.js';

/**
 * Outcome of looking a pack up by name. Unknown names are ordinary user
 * input (typos, stale arguments), so they are a value, not an error.
 */
export type PackLookup =
  | { found: true; pack: Pack }
  | { found: false; message: string };

const NO_ROOT_PACK_MESSAGE =
  'No root pack found. First double check a root pack exists (a package.yml file in the application root). ' +
  'Secondly, double check your packwerk.yml `package_paths` includes the root pack by using command packscan list-packs.';

/**
 * Longest name first, then alphabetical.
 */
export function comparePacks(a: Pack, b: Pack): number {
  if (a.name.length !== b.name.length) {
    return b.name.length - a.name.length;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export class PackSet {
  /** Packs sorted by {@link comparePacks} */
  readonly packs: readonly Pack[];
  /** Every violation recorded in any pack's package_todo.yml */
  readonly allViolations: ViolationSet;
  private readonly indexedPacks: ReadonlyMap<string, Pack>;
  private readonly owningPackNameForFile: ReadonlyMap<string, string>;

  private constructor(
    packs: Pack[],
    indexedPacks: Map<string, Pack>,
    owningPackNameForFile: Map<string, string>,
    allViolations: ViolationSet
  ) {
    this.packs = packs;
    this.indexedPacks = indexedPacks;
    this.owningPackNameForFile = owningPackNameForFile;
    this.allViolations = allViolations;
  }

  /**
   * @param packs - every pack in the project; names must be unique
   * @param owningPackageYmlForFile - absolute file path → absolute path of its nearest package.yml
   * @throws PackSetError when there is no root (`.`) pack
   */
  static build(
    packs: Iterable<Pack>,
    owningPackageYmlForFile: ReadonlyMap<string, string>
  ): PackSet {
    const sorted = [...packs].sort(comparePacks);

    const indexedPacks = new Map<string, Pack>();
    const packNameByYml = new Map<string, string>();
    const allViolations = new ViolationSet();

    for (const pack of sorted) {
      indexedPacks.set(pack.name, pack);
      packNameByYml.set(pack.yml, pack.name);
      for (const violation of pack.recordedViolations) {
        allViolations.add(violation);
      }
    }

    if (!indexedPacks.has(ROOT_PACK_NAME)) {
      throw new PackSetError(ErrorCodes.NO_ROOT_PACK, NO_ROOT_PACK_MESSAGE);
    }

    // Files whose package.yml is not a known pack stay unowned
    const owningPackNameForFile = new Map<string, string>();
    for (const [file, yml] of owningPackageYmlForFile) {
      const packName = packNameByYml.get(yml);
      if (packName !== undefined) {
        owningPackNameForFile.set(file, packName);
      }
    }

    return new PackSet(sorted, indexedPacks, owningPackNameForFile, allViolations);
  }

  /**
   * The pack owning an analyzed file, or null if it has none.
   * @throws PackSetError if the owner recorded for the file is not indexed
   */
  forFile(absoluteFilePath: string): Pack | null {
    const packName = this.owningPackNameForFile.get(absoluteFilePath);
    if (packName === undefined) return null;

    const pack = this.indexedPacks.get(packName);
    if (!pack) {
      throw new PackSetError(
        ErrorCodes.INCONSISTENT_INDEX,
        `Walking the directory identified that the following file belongs to ${packName}, ` +
          `but that pack cannot be found in the packset:\n${absoluteFilePath}`,
        { file: absoluteFilePath, packName }
      );
    }
    return pack;
  }

  /**
   * Look a pack up by name. One trailing `/`, as shell completion adds
   * to directory names, is ignored.
   */
  forPack(packName: string): PackLookup {
    const name = packName.endsWith('/') ? packName.slice(0, -1) : packName;
    const pack = this.indexedPacks.get(name);
    if (pack) {
      return { found: true, pack };
    }
    return { found: false, message: 'No pack found.' };
  }

  rootPack(): Pack {
    const pack = this.indexedPacks.get(ROOT_PACK_NAME);
    if (!pack) {
      throw new PackSetError(
        ErrorCodes.NO_ROOT_PACK,
        'No root pack found. This error should have been caught when building the pack set'
      );
    }
    return pack;
  }
}
