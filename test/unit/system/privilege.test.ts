import { findPrivilegeHandle, requirePrivilege, escalate } from '../../../src/system/privilege.js';
import { UpgradeErrorCode } from '../../../src/shared/errors.js';
import { FakeResolver, makeContext, SUDO } from '../../support/fakes.js';

describe('findPrivilegeHandle', () => {
  it('prefers doas over sudo when auto-detecting', async () => {
    const handle = await findPrivilegeHandle(new FakeResolver(['sudo', 'doas']));
    expect(handle).toEqual({ method: 'doas', path: '/usr/bin/doas' });
  });

  it('looks only for the configured helper', async () => {
    const resolver = new FakeResolver(['doas']);
    await expect(findPrivilegeHandle(resolver, 'sudo')).resolves.toBeNull();
    expect(resolver.lookups).toEqual(['sudo']);
  });

  it('returns null when nothing is installed', async () => {
    await expect(findPrivilegeHandle(new FakeResolver([]))).resolves.toBeNull();
  });
});

describe('requirePrivilege', () => {
  it('returns the handle when one is available', async () => {
    await expect(requirePrivilege(makeContext(), 'needed')).resolves.toEqual(SUDO);
  });

  it('throws PRIVILEGE_UNAVAILABLE when none is configured', async () => {
    const ctx = makeContext({ privilege: null });
    await expect(requirePrivilege(ctx, 'sudo is required', { backend: 'pacman' })).rejects.toMatchObject({
      code: UpgradeErrorCode.PRIVILEGE_UNAVAILABLE,
      message: 'sudo is required',
      context: { backend: 'pacman' },
    });
  });
});

describe('escalate', () => {
  it('prefixes argv with the helper path', () => {
    expect(escalate(SUDO, ['/usr/bin/pacman', '-Syu'])).toEqual(['/usr/bin/sudo', '/usr/bin/pacman', '-Syu']);
  });
});
