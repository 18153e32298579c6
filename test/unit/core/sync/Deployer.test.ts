/**
 * Unit tests for Deployer
 *
 * Device side is a FakeTransferAgent holding an in-memory filesystem.
 */

import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';

import { Deployer } from '../../../../src/core/sync/Deployer.js';
import { ConfigurationError } from '../../../../src/errors/forgeErrors.js';
import type { DeploySettings, ForgeSettings } from '../../../../src/config/buildConfig.js';
import { FakePasswordTransfer, FakeTransferAgent, makeSettings, writeTree } from '../../../helpers/fakes.js';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('Deployer', () => {
  let root: string;
  let agent: FakeTransferAgent;
  let transfer: FakePasswordTransfer;

  const deployerWith = (deploy: Partial<DeploySettings> = {}): Deployer => {
    const settings: ForgeSettings = makeSettings(root, {}, deploy);
    return new Deployer(settings, agent, transfer);
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'deploy-test-'));
    await writeTree(path.join(root, 'mpy_xtensa'), {
      'main.mpy': 'MPY:main',
      'lib/util.mpy': 'MPY:util',
      'version.json': '{}\n'
    });
    agent = new FakeTransferAgent({
      'main.mpy': 'MPY:main',
      'old.mpy': 'stale',
      'webrepl_cfg.py': "PASS = 'test-secret'\n"
    });
    transfer = new FakePasswordTransfer();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  // ============================================================
  // Incremental deploy
  // ============================================================
  describe('incremental deploy', () => {
    it('should send new files, remove obsolete ones and keep protected ones', async () => {
      const report = await deployerWith().deploy();

      expect(report.success).to.be.true;
      expect(report.mode).to.equal('mpremote');
      expect(report.target).to.equal('/dev/ttyUSB0');
      expect(report.localFiles).to.equal(3);
      expect(report.summary).to.equal('+2 new, -1 obsolete (3 total)');
      expect(report.diff?.protectedKept).to.deep.equal(['webrepl_cfg.py']);
      expect([...agent.files.keys()].sort()).to.deep.equal(['lib/util.mpy', 'main.mpy', 'version.json', 'webrepl_cfg.py']);
      expect(agent.calls.filter(call => call.method === 'softReset')).to.have.length(1);
    });

    it('should do nothing on a second deploy of the same tree', async () => {
      await deployerWith().deploy();
      agent.calls.length = 0;

      const report = await deployerWith().deploy();

      expect(report.success).to.be.true;
      expect(report.summary).to.equal('No changes detected');
      expect(report.sync).to.be.null;
      expect(agent.mutations()).to.deep.equal([]);
    });

    it('should leave the device untouched in dry-run mode', async () => {
      const report = await deployerWith().deploy({ dryRun: true });

      expect(report.dryRun).to.be.true;
      expect(report.sync?.transferred.map(outcome => outcome.status)).to.deep.equal(['planned', 'planned']);
      expect(agent.mutations()).to.deep.equal([]);
    });

    it('should treat every file as new when the listing fails', async () => {
      agent.failListing = true;

      const report = await deployerWith({ autoReset: false }).deploy({ dryRun: true });

      expect(report.probe?.degraded).to.be.true;
      expect(report.diff?.newFiles).to.deep.equal(['lib/util.mpy', 'main.mpy', 'version.json']);
      expect(report.diff?.obsoleteFiles).to.deep.equal([]);
    });

    it('should skip excluded local files', async () => {
      const report = await deployerWith({ exclude: ['*.json'] }).deploy();

      expect(report.localFiles).to.equal(2);
      expect(agent.files.has('version.json')).to.be.false;
    });
  });

  // ============================================================
  // Clean deploys
  // ============================================================
  describe('clean deploy', () => {
    it('should remove every unprotected file before sending the tree', async () => {
      const report = await deployerWith({ cleanDeploy: true, autoReset: false }).deploy();

      expect(report.success).to.be.true;
      expect(agent.mutations().slice(0, 2)).to.deep.equal([
        { method: 'removeFile', args: ['/dev/ttyUSB0', 'main.mpy'] },
        { method: 'removeFile', args: ['/dev/ttyUSB0', 'old.mpy'] }
      ]);
      expect([...agent.files.keys()].sort()).to.deep.equal(['lib/util.mpy', 'main.mpy', 'version.json', 'webrepl_cfg.py']);
    });

    it('should apply configured removals', async () => {
      agent.files.set('legacy.py', 'old code');

      const report = await deployerWith({ customClean: ['/legacy.py', 'webrepl_cfg.py'] }).deploy();

      expect(agent.files.has('legacy.py')).to.be.false;
      expect(agent.files.has('webrepl_cfg.py')).to.be.true;
      expect(report.diff?.skippedRemovals).to.deep.equal([{ path: 'webrepl_cfg.py', reason: 'protected' }]);
    });
  });

  // ============================================================
  // Device selection
  // ============================================================
  describe('selectDevice', () => {
    it('should prefer the explicit option over configuration', async () => {
      const deployer = deployerWith({ device: '/dev/ttyACM0' });

      expect(await deployer.selectDevice('/dev/ttyUSB1')).to.deep.equal({ device: '/dev/ttyUSB1', source: 'option' });
      expect(await deployer.selectDevice()).to.deep.equal({ device: '/dev/ttyACM0', source: 'config' });
    });

    it('should refuse to guess between several devices', async () => {
      agent.devices = [
        { port: '/dev/ttyUSB0', description: 'one' },
        { port: '/dev/ttyUSB1', description: 'two' }
      ];

      const report = await deployerWith().deploy();

      expect(report.success).to.be.false;
      expect(report.error).to.equal('2 devices found, specify one with the device option');
      expect(report.candidates).to.have.length(2);
      expect(agent.mutations()).to.deep.equal([]);
    });

    it('should report when no device is connected', async () => {
      agent.devices = [];

      const report = await deployerWith().deploy();

      expect(report.error).to.equal('No MicroPython device found');
    });
  });

  describe('local tree', () => {
    it('should require a built output directory', async () => {
      await fs.rm(path.join(root, 'mpy_xtensa'), { recursive: true, force: true });

      expect(await captureError(deployerWith().deploy())).to.be.instanceOf(ConfigurationError);
    });
  });

  // ============================================================
  // WebREPL fallback
  // ============================================================
  describe('webrepl', () => {
    it('should ping then push the whole tree', async () => {
      const report = await deployerWith({ useWebrepl: true }).deploy();

      expect(report.mode).to.equal('webrepl');
      expect(report.success).to.be.true;
      expect(transfer.pings).to.equal(1);
      expect(transfer.pushed.map(push => push.remote)).to.deep.equal(['lib/util.mpy', 'main.mpy', 'version.json']);
      expect(report.summary).to.equal('3/3 files pushed to micropython.local:8266');
      expect(agent.calls).to.deep.equal([]);
    });

    it('should fail without pushing when the endpoint is unreachable', async () => {
      transfer.failPing = true;

      const report = await deployerWith().deploy({ webrepl: true });

      expect(report.success).to.be.false;
      expect(report.error).to.equal('WebREPL connection failed: Cannot connect micropython.local:8266: connection refused');
      expect(transfer.pushed).to.deep.equal([]);
    });

    it('should plan without connecting in dry-run mode', async () => {
      const report = await deployerWith({ useWebrepl: true }).deploy({ dryRun: true });

      expect(transfer.pings).to.equal(0);
      expect(report.sync?.transferred.every(outcome => outcome.status === 'planned')).to.be.true;
    });

    it('should require a password even in dry-run mode', async () => {
      const error = await captureError(deployerWith({ useWebrepl: true, password: '' }).deploy({ dryRun: true }));

      expect(error).to.be.instanceOf(ConfigurationError);
    });
  });
});
