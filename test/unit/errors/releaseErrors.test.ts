import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  ReleaseError,
  InvalidVersionError,
  ManifestNotFoundError,
  CollaboratorFailureError,
  IOFailureError,
  ConfigError,
  errorMessage,
  errnoCode
} from '../../../src/errors/releaseErrors.js';

describe('Release Error Classes', () => {
  describe('ReleaseError', () => {
    it('should create base error with correct properties', () => {
      const error = new ReleaseError('Test message', 'IO_FAILURE', { extra: 'data' });

      expect(error.message).to.equal('Test message');
      expect(error.code).to.equal('IO_FAILURE');
      expect(error.data).to.deep.equal({ extra: 'data' });
      expect(error.name).to.equal('ReleaseError');
      expect(error).to.be.instanceOf(Error);
    });

    it('should work without additional data', () => {
      const error = new ReleaseError('Test message', 'CONFIG_ERROR');
      expect(error.data).to.be.undefined;
    });
  });

  describe('InvalidVersionError', () => {
    it('should name the value and the reason', () => {
      const error = new InvalidVersionError('1.0', 'expected at least 3 numeric segments, got 2');

      expect(error.message).to.equal('Invalid version "1.0": expected at least 3 numeric segments, got 2');
      expect(error.code).to.equal('INVALID_VERSION');
      expect(error.name).to.equal('InvalidVersionError');
      expect(error.data).to.deep.equal({
        value: '1.0',
        reason: 'expected at least 3 numeric segments, got 2'
      });
      expect(error).to.be.instanceOf(ReleaseError);
    });
  });

  describe('ManifestNotFoundError', () => {
    it('should keep the searched location', () => {
      const error = new ManifestNotFoundError('No Solution.xml found under /tmp/x', '/tmp/x');

      expect(error.message).to.equal('No Solution.xml found under /tmp/x');
      expect(error.code).to.equal('MANIFEST_NOT_FOUND');
      expect(error.data).to.deep.equal({ searchedIn: '/tmp/x' });
    });
  });

  describe('CollaboratorFailureError', () => {
    it('should use stderr as the detail', () => {
      const error = new CollaboratorFailureError('pac solution', 3, '  solution not found\n');

      expect(error.message).to.equal('pac solution failed: solution not found');
      expect(error.code).to.equal('COLLABORATOR_FAILURE');
      expect(error.data).to.deep.equal({
        command: 'pac solution',
        exitCode: 3,
        stderr: '  solution not found\n'
      });
    });

    it('should fall back to the exit code when stderr is empty', () => {
      const error = new CollaboratorFailureError('git commit', 128, '');
      expect(error.message).to.equal('git commit failed: exited with code 128');
    });
  });

  describe('IOFailureError', () => {
    it('should describe the operation and path', () => {
      const error = new IOFailureError('read', 'Other/Solution.xml', 'EBUSY');

      expect(error.message).to.equal('Cannot read Other/Solution.xml: EBUSY');
      expect(error.code).to.equal('IO_FAILURE');
      expect(error.data).to.deep.equal({ operation: 'read', path: 'Other/Solution.xml', reason: 'EBUSY' });
    });
  });

  describe('ConfigError', () => {
    it('should create config error with field information', () => {
      const error = new ConfigError('bump', 'huge', 'none | patch | minor | major');

      expect(error.message).to.equal('Invalid bump: expected none | patch | minor | major, got "huge"');
      expect(error.code).to.equal('CONFIG_ERROR');
    });

    it('should render object values as JSON', () => {
      const error = new ConfigError('noise', ['a'], 'an object');
      expect(error.message).to.equal('Invalid noise: expected an object, got "["a"]"');
    });
  });

  describe('errorMessage()', () => {
    it('should read Error messages and stringify anything else', () => {
      expect(errorMessage(new Error('boom'))).to.equal('boom');
      expect(errorMessage('plain')).to.equal('plain');
      expect(errorMessage(42)).to.equal('42');
    });
  });

  describe('errnoCode()', () => {
    it('should return the errno code of a Node error', () => {
      const error = Object.assign(new Error('busy'), { code: 'EBUSY' });
      expect(errnoCode(error)).to.equal('EBUSY');
    });

    it('should return undefined when there is no code', () => {
      expect(errnoCode(new Error('plain'))).to.be.undefined;
      expect(errnoCode('EBUSY')).to.be.undefined;
    });
  });
});
