import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { findLeftoverConfigs, scanAndReportLeftoverConfigs, LEFTOVER_HEADER } from '../../src/pacnew.js';

describe('leftover config scan', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'archup-etc-'));
    await fs.mkdir(path.join(root, 'pacman.d'), { recursive: true });
    await fs.writeFile(path.join(root, 'pacman.conf'), '');
    await fs.writeFile(path.join(root, 'pacman.d', 'mirrorlist'), '');
    await fs.writeFile(path.join(root, 'pacnew.txt'), '');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('prints nothing, not even the header, when there are no leftovers', async () => {
    const lines: string[] = [];
    await scanAndReportLeftoverConfigs(root, (line) => lines.push(line));
    expect(lines).toEqual([]);
  });

  it('prints the header and the single .pacnew path', async () => {
    const leftover = path.join(root, 'pacman.d', 'mirrorlist.pacnew');
    await fs.writeFile(leftover, '');
    const lines: string[] = [];
    await scanAndReportLeftoverConfigs(root, (line) => lines.push(line));
    expect(lines).toEqual([LEFTOVER_HEADER, leftover]);
  });

  it('finds both suffixes, sorted', async () => {
    await fs.writeFile(path.join(root, 'pacman.conf.pacsave'), '');
    await fs.writeFile(path.join(root, 'pacman.d', 'mirrorlist.pacnew'), '');
    await expect(findLeftoverConfigs(root)).resolves.toEqual([
      path.join(root, 'pacman.conf.pacsave'),
      path.join(root, 'pacman.d', 'mirrorlist.pacnew'),
    ]);
  });

  it('ignores directories named like leftovers', async () => {
    await fs.mkdir(path.join(root, 'old.pacnew'));
    await expect(findLeftoverConfigs(root)).resolves.toEqual([]);
  });

  it('returns nothing for a missing root', async () => {
    await expect(findLeftoverConfigs(path.join(root, 'does-not-exist'))).resolves.toEqual([]);
  });
});
