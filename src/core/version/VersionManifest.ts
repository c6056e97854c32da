/**
 * VersionManifest - reads and writes the version element of an exported
 * solution manifest (Other/Solution.xml for Power Platform exports)
 *
 * Only the text content of the single version element is ever touched;
 * every other byte of the document is written back unchanged so the mirror
 * does not see formatting churn.
 */

import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { log } from '../../utils/logger.js';
import { NoiseFilter } from '../../utils/noiseFilter.js';
import { IOFailureError, ManifestNotFoundError, errorMessage } from '../../errors/releaseErrors.js';

export const DEFAULT_MANIFEST_FILE = 'Solution.xml';
export const DEFAULT_VERSION_ELEMENT = 'Version';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches <Element ...>text</Element>; the text may not contain markup
 */
function elementPattern(elementName: string): RegExp {
  const name = escapeRegExp(elementName);
  return new RegExp(`(<${name}(?:\\s[^>]*)?>)([^<]*)(</${name}\\s*>)`, 'g');
}

/**
 * Recursively collect relative paths whose base name equals fileName
 */
async function findByName(
  rootAbs: string,
  relDir: string,
  fileName: string,
  filter: NoiseFilter,
  out: string[]
): Promise<void> {
  const dirAbs = relDir ? path.join(rootAbs, relDir) : rootAbs;
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirAbs, { withFileTypes: true });
  } catch (error) {
    throw new IOFailureError('read directory', dirAbs, errorMessage(error));
  }

  for (const entry of entries) {
    const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (!filter.shouldPruneDirectory(rel)) {
        await findByName(rootAbs, rel, fileName, filter, out);
      }
    } else if (entry.isFile() && entry.name === fileName) {
      out.push(rel);
    }
  }
}

/**
 * Shallowest path first, then alphabetical
 */
function byDepthThenName(a: string, b: string): number {
  const depth = a.split('/').length - b.split('/').length;
  return depth !== 0 ? depth : a.localeCompare(b);
}

export class VersionManifest {
  constructor(
    /** Absolute path of the manifest file */
    public readonly filePath: string,
    public readonly elementName: string = DEFAULT_VERSION_ELEMENT
  ) {}

  /**
   * Locate the manifest file by name under an exported tree
   *
   * @throws ManifestNotFoundError when no file with that name exists
   */
  static async locate(
    rootDir: string,
    fileName: string = DEFAULT_MANIFEST_FILE,
    elementName: string = DEFAULT_VERSION_ELEMENT
  ): Promise<VersionManifest> {
    const rootAbs = path.resolve(rootDir);
    const matches: string[] = [];
    await findByName(rootAbs, '', fileName, NoiseFilter.forMirror(), matches);

    if (matches.length === 0) {
      throw new ManifestNotFoundError(`No ${fileName} found under ${rootAbs}`, rootAbs);
    }

    matches.sort(byDepthThenName);
    if (matches.length > 1) {
      log.warn(`[MANIFEST] ${matches.length} files named ${fileName}; using ${matches[0]}`);
    }

    const filePath = path.join(rootAbs, ...matches[0].split('/'));
    log.debug(`[MANIFEST] Using ${filePath}`);
    return new VersionManifest(filePath, elementName);
  }

  /**
   * Read the text content of the version element
   *
   * @throws ManifestNotFoundError when the element is absent or repeated
   */
  async readVersion(): Promise<string> {
    const content = await this.readContent();
    const matches = [...content.matchAll(elementPattern(this.elementName))];
    this.assertSingleElement(matches.length);
    return matches[0][2].trim();
  }

  /**
   * Replace the text content of the version element, preserving the rest
   * of the document byte for byte
   */
  async writeVersion(versionText: string): Promise<void> {
    const content = await this.readContent();
    const pattern = elementPattern(this.elementName);
    const count = [...content.matchAll(pattern)].length;
    this.assertSingleElement(count);

    const updated = content.replace(pattern, (_match, open: string, _text: string, close: string) =>
      `${open}${versionText}${close}`
    );

    try {
      await fs.writeFile(this.filePath, updated, 'utf-8');
    } catch (error) {
      throw new IOFailureError('write', this.filePath, errorMessage(error));
    }
    log.debug(`[MANIFEST] Wrote <${this.elementName}>${versionText}</${this.elementName}>`);
  }

  private async readContent(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new IOFailureError('read', this.filePath, errorMessage(error));
    }
  }

  private assertSingleElement(count: number): void {
    if (count === 0) {
      throw new ManifestNotFoundError(
        `No <${this.elementName}> element in ${this.filePath}`,
        this.filePath
      );
    }
    if (count > 1) {
      throw new ManifestNotFoundError(
        `Expected exactly one <${this.elementName}> element in ${this.filePath}, found ${count}`,
        this.filePath
      );
    }
  }
}
