import { expect } from 'chai';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  ReleaseConfigManager,
  parseConfigObject,
  readEnvironment,
  renderCommitMessage,
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_CONFIG_FILE
} from '../../../src/config/releaseConfig.js';
import { ConfigError } from '../../../src/errors/releaseErrors.js';

describe('releaseConfig', () => {
  const cwd = path.resolve('/work');

  describe('ReleaseConfigManager.resolve()', () => {
    it('should fill defaults around the solution name', () => {
      const config = ReleaseConfigManager.resolve([{ solutionName: 'Contoso' }], cwd);

      expect(config.solutionName).to.equal('Contoso');
      expect(config.workingDir).to.equal(path.join(cwd, 'Contoso'));
      expect(config.managed).to.be.false;
      expect(config.bump).to.equal('none');
      expect(config.prerelease).to.equal('');
      expect(config.manifestFileName).to.equal('Solution.xml');
      expect(config.versionElement).to.equal('Version');
      expect(config.exportCommand).to.equal('pac');
      expect(config.tempRoot).to.be.undefined;
      expect(config.retryDelayMs).to.equal(200);
      expect(config.commit).to.be.true;
      expect(config.tag).to.be.true;
      expect(config.push).to.be.false;
      expect(config.dryRun).to.be.false;
      expect(config.commitMessage).to.equal(DEFAULT_COMMIT_MESSAGE);
      expect(config.noise).to.deep.equal({
        suffixes: ['.msapp'],
        regexes: [],
        globs: [],
        ignoreFile: path.join(cwd, 'Contoso', '.snapshotignore')
      });
    });

    it('should let later layers win', () => {
      const config = ReleaseConfigManager.resolve(
        [
          { solutionName: 'FromFile', bump: 'minor', exportCommand: 'pac-file' },
          { exportCommand: 'pac-env' },
          { solutionName: 'FromCli' }
        ],
        cwd
      );

      expect(config.solutionName).to.equal('FromCli');
      expect(config.bump).to.equal('minor');
      expect(config.exportCommand).to.equal('pac-env');
    });

    it('should merge noise settings field by field', () => {
      const config = ReleaseConfigManager.resolve(
        [
          { solutionName: 'Contoso', noise: { globs: ['*.log'], ignoreFile: null } },
          { noise: { suffixes: ['.tmp'] } }
        ],
        cwd
      );

      expect(config.noise.suffixes).to.deep.equal(['.tmp']);
      expect(config.noise.globs).to.deep.equal(['*.log']);
      expect(config.noise.ignoreFile).to.be.null;
    });

    it('should resolve relative paths against cwd', () => {
      const config = ReleaseConfigManager.resolve(
        [{ solutionName: 'Contoso', workingDir: 'solutions/Contoso', tempRoot: 'tmp' }],
        cwd
      );

      expect(config.workingDir).to.equal(path.join(cwd, 'solutions', 'Contoso'));
      expect(config.tempRoot).to.equal(path.join(cwd, 'tmp'));
    });

    it('should resolve a relative ignore file inside the working tree', () => {
      const config = ReleaseConfigManager.resolve(
        [{ solutionName: 'Contoso', workingDir: 'solutions/Contoso', noise: { ignoreFile: 'config/noise.ignore' } }],
        cwd
      );

      expect(config.noise.ignoreFile).to.equal(path.join(cwd, 'solutions', 'Contoso', 'config', 'noise.ignore'));
    });

    it('should keep an absolute ignore file as given', () => {
      const ignoreFile = path.resolve('/shared/noise.ignore');
      const config = ReleaseConfigManager.resolve([{ solutionName: 'Contoso', noise: { ignoreFile } }], cwd);

      expect(config.noise.ignoreFile).to.equal(ignoreFile);
    });

    it('should freeze the result', () => {
      const config = ReleaseConfigManager.resolve([{ solutionName: 'Contoso' }], cwd);

      expect(Object.isFrozen(config)).to.be.true;
      expect(Object.isFrozen(config.noise)).to.be.true;
      expect(Object.isFrozen(config.noise.suffixes)).to.be.true;
    });

    it('should require a solution name', () => {
      expect(() => ReleaseConfigManager.resolve([{}], cwd)).to.throw(
        ConfigError,
        'Invalid solutionName: expected a solution name (--solution), got ""'
      );
    });
  });

  describe('parseConfigObject()', () => {
    it('should accept every known key', () => {
      const layer = parseConfigObject({
        solutionName: ' Contoso ',
        managed: true,
        bump: 'Minor',
        prerelease: 'beta',
        retryDelayMs: 0,
        noise: { suffixes: ['.msapp', '.tmp'], ignoreFile: null }
      });

      expect(layer).to.deep.equal({
        solutionName: 'Contoso',
        managed: true,
        bump: 'minor',
        prerelease: 'beta',
        retryDelayMs: 0,
        noise: { suffixes: ['.msapp', '.tmp'], ignoreFile: null }
      });
    });

    it('should reject a non-object document', () => {
      expect(() => parseConfigObject([])).to.throw(ConfigError, 'Invalid config file: expected a JSON object, got "[]"');
    });

    it('should reject values of the wrong type', () => {
      expect(() => parseConfigObject({ managed: 'yes' })).to.throw(
        ConfigError,
        'Invalid managed: expected true or false, got "yes"'
      );
      expect(() => parseConfigObject({ retryDelayMs: -5 })).to.throw(ConfigError, 'Invalid retryDelayMs');
      expect(() => parseConfigObject({ noise: { globs: 'x' } })).to.throw(ConfigError, 'Invalid noise.globs');
    });

    it('should reject an unknown bump kind', () => {
      expect(() => parseConfigObject({ bump: 'huge' })).to.throw(
        ConfigError,
        'Invalid bump: expected none | patch | minor | major, got "huge"'
      );
    });

    it('should ignore unknown keys', () => {
      expect(parseConfigObject({ color: 'blue' })).to.deep.equal({});
    });
  });

  describe('readEnvironment()', () => {
    it('should read the supported variables', () => {
      const layer = readEnvironment({
        SNAPSHOT_EXPORT_COMMAND: '/opt/pac/pac',
        SNAPSHOT_TEMP_ROOT: '/var/tmp',
        SNAPSHOT_RETRY_DELAY_MS: '50'
      });

      expect(layer).to.deep.equal({
        exportCommand: '/opt/pac/pac',
        tempRoot: '/var/tmp',
        retryDelayMs: 50
      });
    });

    it('should ignore unset variables', () => {
      expect(readEnvironment({})).to.deep.equal({});
    });

    it('should reject a non-numeric delay', () => {
      expect(() => readEnvironment({ SNAPSHOT_RETRY_DELAY_MS: 'abc' })).to.throw(
        ConfigError,
        'Invalid SNAPSHOT_RETRY_DELAY_MS: expected a non-negative integer (milliseconds), got "abc"'
      );
    });
  });

  describe('renderCommitMessage()', () => {
    it('should substitute known placeholders and keep unknown ones', () => {
      const message = renderCommitMessage('Release {solution} {version} ({unknown})', {
        solution: 'Contoso',
        version: '1.2.3'
      });
      expect(message).to.equal('Release Contoso 1.2.3 ({unknown})');
    });

    it('should substitute repeated placeholders', () => {
      expect(renderCommitMessage('{version} from {previousVersion}, {version}', {
        version: '2.0.0',
        previousVersion: '1.9.0'
      })).to.equal('2.0.0 from 1.9.0, 2.0.0');
    });
  });

  describe('ReleaseConfigManager.load()', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'release-config-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should read the default config file from cwd', async () => {
      await fs.writeFile(
        path.join(tempDir, DEFAULT_CONFIG_FILE),
        JSON.stringify({ solutionName: 'Contoso', workingDir: 'solutions/Contoso', bump: 'patch' })
      );

      const config = await ReleaseConfigManager.load({
        cli: { bump: 'major' },
        env: { SNAPSHOT_RETRY_DELAY_MS: '10' },
        cwd: tempDir
      });

      expect(config.solutionName).to.equal('Contoso');
      expect(config.workingDir).to.equal(path.join(tempDir, 'solutions', 'Contoso'));
      expect(config.bump).to.equal('major');
      expect(config.retryDelayMs).to.equal(10);
    });

    it('should work without a config file', async () => {
      const config = await ReleaseConfigManager.load({ cli: { solutionName: 'Contoso' }, env: {}, cwd: tempDir });
      expect(config.workingDir).to.equal(path.join(tempDir, 'Contoso'));
    });

    it('should fail when an explicit config file is missing', async () => {
      try {
        await ReleaseConfigManager.load({ cli: {}, configPath: 'missing.json', env: {}, cwd: tempDir });
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(ConfigError);
        expect(error).to.have.property('message').that.includes('a readable file');
      }
    });

    it('should fail on invalid JSON', async () => {
      await fs.writeFile(path.join(tempDir, 'bad.json'), '{ "solutionName": ');

      try {
        await ReleaseConfigManager.load({ cli: {}, configPath: 'bad.json', env: {}, cwd: tempDir });
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(ConfigError);
        expect(error).to.have.property('message').that.includes('valid JSON');
      }
    });
  });
});
