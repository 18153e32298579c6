/**
 * Unit tests for the version ledger
 *
 * Tests core functionality of:
 * - declared version extraction and rewriting
 * - manifest load (missing, malformed, lockstep normalization)
 * - save/load round trip
 * - the ledger pass used by builds and version updates
 */

import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as sinon from 'sinon';
import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';
import { promises as fsPromises } from 'fs';

import {
  VersionLedger,
  createEmptySourceManifest,
  extractDeclaredVersion,
  rewriteDeclaredVersion
} from '../../../../src/core/versioning/VersionLedger.js';
import { runLedgerPass } from '../../../../src/core/versioning/ledgerPass.js';
import { ManifestIOError } from '../../../../src/errors/forgeErrors.js';
import { computeSha256 } from '../../../../src/utils/hashUtils.js';

describe('VersionLedger', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));
  });

  afterEach(async () => {
    sinon.restore();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // ============================================================
  // Declared versions
  // ============================================================
  describe('extractDeclaredVersion', () => {
    it('should read a plain string declaration', () => {
      expect(extractDeclaredVersion('import os\n__version__ = "1.2.3"\n')).to.equal('1.2.3');
    });

    it('should read a const() wrapped declaration', () => {
      expect(extractDeclaredVersion("__version__ = const( '0.4.1' )")).to.equal('0.4.1');
    });

    it('should use the first declaration', () => {
      expect(extractDeclaredVersion('__version__ = "1.0.0"\n__version__ = "2.0.0"\n')).to.equal('1.0.0');
    });

    it('should fall back when no declaration exists', () => {
      expect(extractDeclaredVersion('print("hello")')).to.equal('unknown');
      expect(extractDeclaredVersion('print("hello")', '0.1.0')).to.equal('0.1.0');
    });
  });

  describe('rewriteDeclaredVersion', () => {
    it('should keep the const() wrapper and quoting', () => {
      const text = 'x = 1\n__version__ = const("1.2.3")\n';
      expect(rewriteDeclaredVersion(text, '1.3.3')).to.equal('x = 1\n__version__ = const("1.3.3")\n');
    });

    it('should rewrite single-quoted declarations', () => {
      expect(rewriteDeclaredVersion("__version__='0.1.0'", '0.1.1')).to.equal("__version__='0.1.1'");
    });

    it('should return null without a declaration', () => {
      expect(rewriteDeclaredVersion('print("hello")\n', '1.0.0')).to.be.null;
    });
  });

  // ============================================================
  // Load / save
  // ============================================================
  describe('load', () => {
    it('should start empty when no manifest exists', async () => {
      const ledger = await VersionLedger.load(path.join(tempDir, 'version.json'), 'src');

      expect(ledger.existedOnDisk()).to.be.false;
      expect(ledger.trackedPaths()).to.deep.equal([]);
      expect(ledger.getData().format).to.equal('py');
      expect(ledger.getData().source_directory).to.equal('src');
    });

    it('should fill the missing half of lockstep entries with "unknown"', async () => {
      const manifestPath = path.join(tempDir, 'version.json');
      await fs.writeFile(manifestPath, JSON.stringify({
        modules: { 'a.py': '1.0.0' },
        'SHA-256': { 'b.py': 'abc123' }
      }));

      const ledger = await VersionLedger.load(manifestPath);

      expect(ledger.getEntry('a.py')).to.deep.equal({ path: 'a.py', version: '1.0.0', hash: 'unknown' });
      expect(ledger.getEntry('b.py')).to.deep.equal({ path: 'b.py', version: 'unknown', hash: 'abc123' });
      expect(ledger.trackedPaths().sort()).to.deep.equal(['a.py', 'b.py']);
    });

    it('should throw ManifestIOError for malformed JSON', async () => {
      const manifestPath = path.join(tempDir, 'version.json');
      await fs.writeFile(manifestPath, '{ "modules": ');

      let caught: unknown;
      try {
        await VersionLedger.load(manifestPath);
      } catch (error) {
        caught = error;
      }
      expect(caught).to.be.instanceOf(ManifestIOError);
    });
  });

  describe('save', () => {
    it('should round-trip hashes through save and load', async () => {
      const manifestPath = path.join(tempDir, 'version.json');
      const content = Buffer.from('__version__ = "1.0.0"\nprint("こんにちは")\n', 'utf-8');
      const manifest = createEmptySourceManifest('src');
      manifest.modules['main.py'] = '1.0.0';
      manifest['SHA-256']['main.py'] = computeSha256(content);

      await VersionLedger.save(manifestPath, manifest);
      const reloaded = await VersionLedger.load(manifestPath);

      expect(reloaded.getEntry('main.py')?.hash).to.equal(computeSha256(content));
      expect(reloaded.getEntry('main.py')?.version).to.equal('1.0.0');
    });

    it('should pretty-print with a trailing newline and leave no temp file', async () => {
      const manifestPath = path.join(tempDir, 'version.json');
      await VersionLedger.save(manifestPath, createEmptySourceManifest('src'));

      const text = await fs.readFile(manifestPath, 'utf-8');
      expect(text.endsWith('}\n')).to.be.true;
      expect(text).to.include('\n  "format": "py",\n');
      expect(await fs.readdir(tempDir)).to.deep.equal(['version.json']);
    });
  });

  describe('recordModule', () => {
    it('should only mark the ledger modified when an entry changes', async () => {
      const ledger = await VersionLedger.load(path.join(tempDir, 'version.json'));
      expect(ledger.isModified()).to.be.false;

      ledger.recordModule('main.py', '1.0.0', 'h1');
      expect(ledger.isModified()).to.be.true;

      expect(await ledger.saveIfModified()).to.be.true;
      ledger.recordModule('main.py', '1.0.0', 'h1');
      expect(ledger.isModified()).to.be.false;
    });
  });

  // ============================================================
  // Ledger pass
  // ============================================================
  describe('runLedgerPass', () => {
    it('should record unreadable files as error/error', async () => {
      const ledger = await VersionLedger.load(path.join(tempDir, 'version.json'));

      const result = await runLedgerPass(ledger, [
        { path: 'gone.py', sourcePath: path.join(tempDir, 'gone.py') }
      ], { dryRun: false });

      expect(ledger.getEntry('gone.py')).to.deep.equal({ path: 'gone.py', version: 'error', hash: 'error' });
      expect(result.failures).to.have.length(1);
      expect(result.changes[0].kind).to.equal('error');
    });

    it('should keep the old entry when the bumped version cannot be written', async () => {
      const sourcePath = path.join(tempDir, 'main.py');
      await fs.writeFile(sourcePath, '__version__ = "1.0.0"\nprint("v2")\n');
      const ledger = await VersionLedger.load(path.join(tempDir, 'version.json'));
      ledger.recordModule('main.py', '1.0.0', 'old-hash');

      sinon.stub(fsPromises, 'writeFile').rejects(new Error('EROFS: read-only file system'));

      const result = await runLedgerPass(ledger, [{ path: 'main.py', sourcePath }], { policy: 'patch', dryRun: false });

      expect(ledger.getEntry('main.py')).to.deep.equal({ path: 'main.py', version: '1.0.0', hash: 'old-hash' });
      expect(result.failures).to.have.length(1);
      expect(result.failures[0].reason).to.equal('version rewrite failed: EROFS: read-only file system');
      expect(result.changes).to.deep.equal([]);
    });

    it('should record the new hash under the old version when nothing can be rewritten', async () => {
      const sourcePath = path.join(tempDir, 'boot.py');
      await fs.writeFile(sourcePath, 'print("boot v2")\n');
      const ledger = await VersionLedger.load(path.join(tempDir, 'version.json'));
      ledger.recordModule('boot.py', '1.0.0', 'old-hash');

      const result = await runLedgerPass(ledger, [{ path: 'boot.py', sourcePath }], { policy: 'minor', dryRun: false });

      expect(ledger.getEntry('boot.py')).to.deep.equal({
        path: 'boot.py',
        version: '1.0.0',
        hash: computeSha256('print("boot v2")\n')
      });
      expect(result.changes[0].kind).to.equal('changed');
      expect(await fs.readFile(sourcePath, 'utf-8')).to.equal('print("boot v2")\n');
    });

    it('should take a newly declared version when the recorded one cannot be bumped', async () => {
      const content = '__version__ = "1.0.0"\nprint("main")\n';
      const sourcePath = path.join(tempDir, 'main.py');
      await fs.writeFile(sourcePath, content);
      const ledger = await VersionLedger.load(path.join(tempDir, 'version.json'));
      ledger.recordModule('main.py', 'unknown', 'old-hash');

      const result = await runLedgerPass(ledger, [{ path: 'main.py', sourcePath }], { policy: 'patch', dryRun: false });

      expect(ledger.getEntry('main.py')).to.deep.equal({ path: 'main.py', version: '1.0.0', hash: computeSha256(content) });
      expect(result.changes[0].kind).to.equal('changed');
      expect(result.changes[0].version).to.equal('1.0.0');
      expect(await fs.readFile(sourcePath, 'utf-8')).to.equal(content);
    });

    it('should report tracked paths that were not passed as missing', async () => {
      const ledger = await VersionLedger.load(path.join(tempDir, 'version.json'));
      ledger.recordModule('old.py', '1.0.0', 'h');
      ledger.recordModule('kept.py', '1.0.0', 'h');

      const result = await runLedgerPass(ledger, [], { dryRun: true, presentPaths: ['kept.py'] });

      expect(result.missing).to.deep.equal(['old.py']);
      expect(ledger.getEntry('old.py')).to.not.be.undefined;
    });
  });
});
