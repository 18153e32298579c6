import { expect } from 'chai';
import { describe, it } from 'mocha';

import { parseArgs } from '../../src/index.js';
import { ConfigurationError } from '../../src/errors/forgeErrors.js';

describe('parseArgs', () => {
  it('should return no options for an empty command line', () => {
    expect(parseArgs([])).to.deep.equal({});
  });

  it('should read every supported flag', () => {
    expect(parseArgs(['-c', 'boards/esp32.json', '--src-dir', 'firmware', '--output-dir', 'dist', '--preserve-dirs']))
      .to.deep.equal({
        configPath: 'boards/esp32.json',
        srcDir: 'firmware',
        outputDir: 'dist',
        preserveDirs: true
      });
  });

  it('should reject a flag without its value', () => {
    expect(() => parseArgs(['--config', '--preserve-dirs'])).to.throw(ConfigurationError, '--config requires a value');
    expect(() => parseArgs(['--src-dir'])).to.throw(ConfigurationError, '--src-dir requires a value');
  });

  it('should reject unknown arguments', () => {
    expect(() => parseArgs(['--verbose'])).to.throw(ConfigurationError, 'Unknown argument: --verbose');
  });
});
