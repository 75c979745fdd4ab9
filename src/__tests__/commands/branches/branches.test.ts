import { InvalidArgumentError } from 'commander';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createBranchesCommand, parseDirectory } from '../../../commands/branches/branches';

describe('parseDirectory', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'branch-picker-path-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  test('resolves an existing directory', () => {
    expect(parseDirectory(tempDir)).toBe(path.resolve(tempDir));
  });

  test('rejects a missing path', () => {
    const missing = path.join(tempDir, 'missing');

    expect(() => parseDirectory(missing)).toThrow(InvalidArgumentError);
    expect(() => parseDirectory(missing)).toThrow(`Directory '${missing}' does not exist.`);
  });

  test('rejects a file', async () => {
    const file = path.join(tempDir, 'notes.txt');
    await fs.writeFile(file, 'placeholder');

    expect(() => parseDirectory(file)).toThrow(`'${file}' is not a directory.`);
  });
});

describe('createBranchesCommand', () => {
  test('declares the command line flags', () => {
    const command = createBranchesCommand();

    expect(command.name()).toBe('branch-picker');
    expect(command.options.map((option) => option.long)).toEqual([
      '--remote',
      '--switch',
      '--path',
      '--version',
      '--verbose',
      '--quiet',
      '--config',
    ]);
  });

  test('defaults the boolean flags to false', () => {
    const command = createBranchesCommand();

    expect(command.opts()).toEqual({ remote: false, switch: false });
  });
});
