import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';

import {
  MpyCrossCompiler,
  adjacentArtifactPath,
  parseArchitecture,
  parseOptimization
} from '../../../../src/core/build/Compiler.js';
import { CommandError, type CommandRunner } from '../../../../src/utils/processRunner.js';
import { CompilerInvocationError } from '../../../../src/errors/forgeErrors.js';

interface RunnerCall {
  command: string;
  args: string[];
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('Compiler', () => {
  // ============================================================
  // Template parsing
  // ============================================================
  describe('template parsing', () => {
    it('should read the architecture flag', () => {
      expect(parseArchitecture('mpy-cross -march=armv7emsp -O3')).to.equal('armv7emsp');
      expect(parseArchitecture('mpy-cross -O2')).to.be.null;
    });

    it('should read the optimisation level and default to O2', () => {
      expect(parseOptimization('mpy-cross -march=xtensa -O3')).to.equal('O3');
      expect(parseOptimization('mpy-cross -O0 -march=xtensa')).to.equal('O0');
      expect(parseOptimization('mpy-cross -march=xtensa')).to.equal('O2');
    });

    it('should place the artifact next to its source', () => {
      expect(adjacentArtifactPath(path.join('src', 'lib', 'util.py'), '.mpy'))
        .to.equal(path.join('src', 'lib', 'util.mpy'));
    });
  });

  // ============================================================
  // mpy-cross invocation
  // ============================================================
  describe('MpyCrossCompiler', () => {
    let tempDir: string;
    let calls: RunnerCall[];

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'compiler-test-'));
      calls = [];
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    const writingRunner: CommandRunner = async (command, args) => {
      calls.push({ command, args });
      const source = args[args.length - 1];
      if (source.endsWith('.py')) {
        await fs.writeFile(adjacentArtifactPath(source, '.mpy'), 'MPY');
      }
      return { stdout: 'MicroPython v1.22.0 mpy-cross emitting mpy v6\n', stderr: '' };
    };

    it('should reject an empty template', () => {
      expect(() => new MpyCrossCompiler('   ')).to.throw(CompilerInvocationError);
    });

    it('should report the version from --version', async () => {
      const compiler = new MpyCrossCompiler('mpy-cross -march=xtensa -O2', writingRunner);

      expect(await compiler.checkAvailable()).to.equal('MicroPython v1.22.0 mpy-cross emitting mpy v6');
      expect(calls).to.deep.equal([{ command: 'mpy-cross', args: ['--version'] }]);
    });

    it('should report an unavailable compiler', async () => {
      const missing: CommandRunner = async (command) => {
        throw new CommandError(command, 'not-found', `${command} not found on PATH`);
      };
      const compiler = new MpyCrossCompiler('mpy-cross', missing);

      const error = await captureError(compiler.checkAvailable());

      expect(error).to.be.instanceOf(CompilerInvocationError);
      if (error instanceof CompilerInvocationError) {
        expect(error.reason).to.equal('unavailable');
      }
    });

    it('should pass template arguments before the source path', async () => {
      const source = path.join(tempDir, 'main.py');
      await fs.writeFile(source, 'print(1)\n');
      const compiler = new MpyCrossCompiler('mpy-cross -march=xtensa -O2', writingRunner);

      const artifact = await compiler.compile(source);

      expect(artifact).to.equal(path.join(tempDir, 'main.mpy'));
      expect(calls).to.deep.equal([{ command: 'mpy-cross', args: ['-march=xtensa', '-O2', source] }]);
    });

    it('should carry stderr of a failed compile', async () => {
      const failing: CommandRunner = async (command) => {
        throw new CommandError(command, 'exit', `${command} failed: SyntaxError`, 1, 'SyntaxError: invalid syntax\n');
      };
      const compiler = new MpyCrossCompiler('mpy-cross', failing);

      const error = await captureError(compiler.compile(path.join(tempDir, 'bad.py')));

      expect(error).to.be.instanceOf(CompilerInvocationError);
      if (error instanceof CompilerInvocationError) {
        expect(error.reason).to.equal('exit');
        expect(error.data?.stderr).to.equal('SyntaxError: invalid syntax');
      }
    });

    it('should fail when no artifact is produced', async () => {
      const silent: CommandRunner = async () => ({ stdout: '', stderr: '' });
      const compiler = new MpyCrossCompiler('mpy-cross', silent);
      const source = path.join(tempDir, 'quiet.py');

      const error = await captureError(compiler.compile(source));

      expect(error).to.be.instanceOf(CompilerInvocationError);
      if (error instanceof CompilerInvocationError) {
        expect(error.reason).to.equal('no-artifact');
        expect(error.data?.expected).to.equal(path.join(tempDir, 'quiet.mpy'));
      }
    });
  });
});
