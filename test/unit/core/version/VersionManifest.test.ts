import { expect } from 'chai';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { VersionManifest } from '../../../../src/core/version/VersionManifest.js';
import { ManifestNotFoundError } from '../../../../src/errors/releaseErrors.js';

const MANIFEST = `<?xml version="1.0" encoding="utf-8"?>
<ImportExportXml version="9.2" SolutionPackageVersion="9.2">
  <SolutionManifest>
    <UniqueName>Contoso</UniqueName>
    <VersionNumber>7</VersionNumber>
    <Version>1.4.2</Version>
    <Managed>0</Managed>
  </SolutionManifest>
</ImportExportXml>
`;

describe('VersionManifest', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'manifest-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(relPath: string, content: string): Promise<string> {
    const abs = path.join(tempDir, ...relPath.split('/'));
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
    return abs;
  }

  describe('locate()', () => {
    it('should find the manifest by file name', async () => {
      const abs = await writeFile('Other/Solution.xml', MANIFEST);

      const manifest = await VersionManifest.locate(tempDir);

      expect(manifest.filePath).to.equal(abs);
      expect(manifest.elementName).to.equal('Version');
    });

    it('should prefer the shallowest match', async () => {
      await writeFile('deep/nested/Solution.xml', MANIFEST);
      const shallow = await writeFile('Other/Solution.xml', MANIFEST);

      const manifest = await VersionManifest.locate(tempDir);
      expect(manifest.filePath).to.equal(shallow);
    });

    it('should break depth ties alphabetically', async () => {
      await writeFile('b/Solution.xml', MANIFEST);
      const first = await writeFile('a/Solution.xml', MANIFEST);

      const manifest = await VersionManifest.locate(tempDir);
      expect(manifest.filePath).to.equal(first);
    });

    it('should not look inside .git', async () => {
      await writeFile('.git/Solution.xml', MANIFEST);

      try {
        await VersionManifest.locate(tempDir);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(ManifestNotFoundError);
        expect(error).to.have.property('message', `No Solution.xml found under ${path.resolve(tempDir)}`);
      }
    });

    it('should honour a custom file name', async () => {
      const abs = await writeFile('meta/release.xml', '<Version>0.1.0</Version>');

      const manifest = await VersionManifest.locate(tempDir, 'release.xml');
      expect(manifest.filePath).to.equal(abs);
    });
  });

  describe('readVersion()', () => {
    it('should read the version element text', async () => {
      const abs = await writeFile('Other/Solution.xml', MANIFEST);
      expect(await new VersionManifest(abs).readVersion()).to.equal('1.4.2');
    });

    it('should trim surrounding whitespace', async () => {
      const abs = await writeFile('Solution.xml', '<Version>\n  2.0.1.9\n</Version>');
      expect(await new VersionManifest(abs).readVersion()).to.equal('2.0.1.9');
    });

    it('should read a custom element', async () => {
      const abs = await writeFile('Solution.xml', '<Release><Number>3.0.0</Number></Release>');
      expect(await new VersionManifest(abs, 'Number').readVersion()).to.equal('3.0.0');
    });

    it('should fail when the element is missing', async () => {
      const abs = await writeFile('Solution.xml', '<ImportExportXml></ImportExportXml>');

      try {
        await new VersionManifest(abs).readVersion();
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(ManifestNotFoundError);
        expect(error).to.have.property('message', `No <Version> element in ${abs}`);
      }
    });

    it('should fail when the element is repeated', async () => {
      const abs = await writeFile('Solution.xml', '<a><Version>1.0.0</Version><Version>2.0.0</Version></a>');

      try {
        await new VersionManifest(abs).readVersion();
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(ManifestNotFoundError);
        expect(error).to.have.property('message', `Expected exactly one <Version> element in ${abs}, found 2`);
      }
    });
  });

  describe('writeVersion()', () => {
    it('should replace only the element text', async () => {
      const abs = await writeFile('Other/Solution.xml', MANIFEST);

      await new VersionManifest(abs).writeVersion('1.5.0');

      const content = await fs.readFile(abs, 'utf-8');
      expect(content).to.equal(MANIFEST.replace('<Version>1.4.2</Version>', '<Version>1.5.0</Version>'));
    });

    it('should keep attributes on the element', async () => {
      const abs = await writeFile('Solution.xml', '<a>\r\n<Version kind="solution">1.0.0</Version>\r\n</a>');

      await new VersionManifest(abs).writeVersion('1.0.1');

      expect(await fs.readFile(abs, 'utf-8')).to.equal('<a>\r\n<Version kind="solution">1.0.1</Version>\r\n</a>');
    });

    it('should refuse to write an ambiguous document', async () => {
      const original = '<a><Version>1.0.0</Version><Version>2.0.0</Version></a>';
      const abs = await writeFile('Solution.xml', original);

      try {
        await new VersionManifest(abs).writeVersion('9.9.9');
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(ManifestNotFoundError);
      }
      expect(await fs.readFile(abs, 'utf-8')).to.equal(original);
    });
  });
});
