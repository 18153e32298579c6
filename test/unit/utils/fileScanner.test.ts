import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';

import { directoryExists, hashTree, scanTree } from '../../../src/utils/fileScanner.js';
import { computeSha256 } from '../../../src/utils/hashUtils.js';
import { writeTree } from '../../helpers/fakes.js';

describe('fileScanner', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-test-'));
    await writeTree(tempDir, {
      'main.py': 'print(1)\n',
      'lib/util.py': 'print(2)\n',
      'lib/README.md': '# lib\n',
      'tests/test_main.py': 'assert True\n',
      '__pycache__/main.cpython-311.pyc': 'bytecode'
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should list files with slash-separated sorted paths', async () => {
    expect(await scanTree(tempDir)).to.deep.equal([
      '__pycache__/main.cpython-311.pyc',
      'lib/README.md',
      'lib/util.py',
      'main.py',
      'tests/test_main.py'
    ]);
  });

  it('should apply gitignore-style exclusions to files and directories', async () => {
    expect(await scanTree(tempDir, { exclude: ['__pycache__/', 'tests', '*.md'] }))
      .to.deep.equal(['lib/util.py', 'main.py']);
  });

  it('should honour negated exclusion patterns', async () => {
    expect(await scanTree(tempDir, { exclude: ['lib/*', '!lib/util.py', '__pycache__/'] }))
      .to.deep.equal(['lib/util.py', 'main.py', 'tests/test_main.py']);
  });

  it('should filter by extension', async () => {
    expect(await scanTree(tempDir, { extensions: ['.py'] }))
      .to.deep.equal(['lib/util.py', 'main.py', 'tests/test_main.py']);
  });

  it('should hash every scanned file', async () => {
    const hashes = await hashTree(tempDir, { extensions: ['.py'], exclude: ['tests/'] });

    expect([...hashes]).to.deep.equal([
      ['lib/util.py', computeSha256('print(2)\n')],
      ['main.py', computeSha256('print(1)\n')]
    ]);
  });

  it('should tell directories from files', async () => {
    expect(await directoryExists(path.join(tempDir, 'lib'))).to.be.true;
    expect(await directoryExists(path.join(tempDir, 'main.py'))).to.be.false;
    expect(await directoryExists(path.join(tempDir, 'missing'))).to.be.false;
  });
});
