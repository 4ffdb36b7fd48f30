import { AUTODETECT_ORDER, detectBackend, resolveBackend } from '../../../src/backends/resolver.js';
import { YayParu } from '../../../src/backends/yay-paru.js';
import { Pacman } from '../../../src/backends/pacman.js';
import { UpgradeErrorCode } from '../../../src/shared/errors.js';
import type { BackendId } from '../../../src/backends/types.js';
import { FakeResolver } from '../../support/fakes.js';

// Executable names each backend is detected by.
const EXECUTABLES: Record<BackendId, string> = {
  garuda_update: 'garuda-update',
  paru: 'paru',
  yay: 'yay',
  trizen: 'trizen',
  pikaur: 'pikaur',
  pamac: 'pamac',
  pacman: 'pacman',
  aura: 'aura',
};

const EVERYTHING = [...Object.values(EXECUTABLES), 'powerpill'];

describe('AUTODETECT_ORDER', () => {
  it('is the documented priority list', () => {
    expect(AUTODETECT_ORDER).toEqual(['garuda_update', 'paru', 'yay', 'trizen', 'pikaur', 'pamac', 'pacman', 'aura']);
  });
});

describe('resolveBackend', () => {
  it('picks the highest-priority installed backend', async () => {
    const backend = await resolveBackend('autodetect', new FakeResolver(['pacman', 'yay', 'pamac']));
    expect(backend.id).toBe('yay');
  });

  it('stops probing at the first hit', async () => {
    const resolver = new FakeResolver(['garuda-update', 'paru']);
    await resolveBackend('autodetect', resolver);
    expect(resolver.lookups).toEqual(['garuda-update']);
  });

  it.each(AUTODETECT_ORDER.map((id) => [id]))('forcing %s returns that backend even when everything is installed', async (id) => {
    const backend = await resolveBackend(id, new FakeResolver(EVERYTHING));
    expect(backend.id).toBe(id);
  });

  it('fails with BACKEND_UNAVAILABLE when nothing is installed', async () => {
    await expect(resolveBackend('autodetect', new FakeResolver([]))).rejects.toMatchObject({
      code: UpgradeErrorCode.BACKEND_UNAVAILABLE,
    });
  });

  it('fails with BACKEND_UNAVAILABLE when the forced backend is missing', async () => {
    await expect(resolveBackend('aura', new FakeResolver(['yay', 'pacman']))).rejects.toMatchObject({
      code: UpgradeErrorCode.BACKEND_UNAVAILABLE,
      message: 'The configured package manager "aura" is not installed.',
    });
  });

  it('falls through to aura when it is the only backend', async () => {
    const backend = await resolveBackend('autodetect', new FakeResolver(['aura']));
    expect(backend.id).toBe('aura');
  });
});

describe('detectBackend', () => {
  it('hands yay the powerpill delegate when installed', async () => {
    const backend = await detectBackend('yay', new FakeResolver(['yay', 'pacman', 'powerpill']));
    expect(backend).toBeInstanceOf(YayParu);
    expect(backend).toMatchObject({ executable: '/usr/bin/yay', pacman: '/usr/bin/powerpill' });
  });

  it('falls back to plain pacman as the delegate name', async () => {
    const backend = await detectBackend('paru', new FakeResolver(['paru']));
    expect(backend).toMatchObject({ id: 'paru', pacman: 'pacman' });
  });

  it('uses powerpill as the pacman executable when installed', async () => {
    const backend = await detectBackend('pacman', new FakeResolver(['pacman', 'powerpill']));
    expect(backend).toBeInstanceOf(Pacman);
    expect(backend?.executable).toBe('/usr/bin/powerpill');
  });

  it('detects pacman through powerpill alone', async () => {
    const backend = await detectBackend('pacman', new FakeResolver(['powerpill']));
    expect(backend?.id).toBe('pacman');
  });

  it('returns null when the executable is missing', async () => {
    await expect(detectBackend('pamac', new FakeResolver(['pacman']))).resolves.toBeNull();
  });
});
