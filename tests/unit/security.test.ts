import { AdminGuard, CommandRateGuard } from '../../src/middleware/security.js';
import { AuthorizationError } from '../../src/errors/index.js';

describe('AdminGuard', () => {
  it('should only admit listed admins', () => {
    const guard = new AdminGuard([1]);

    expect(guard.isAdmin(1)).toBe(true);
    expect(() => guard.assertAdmin(2, 'shutdown')).toThrow(AuthorizationError);
  });
});

describe('CommandRateGuard', () => {
  let clock: number;
  let guard: CommandRateGuard;

  beforeEach(() => {
    clock = 0;
    guard = new CommandRateGuard(3, 60, () => clock);
  });

  it('should refuse the call past the limit with the seconds until a slot frees', () => {
    expect(guard.check(7)).toEqual({ allowed: true });
    clock = 10_000;
    expect(guard.check(7)).toEqual({ allowed: true });
    expect(guard.check(7)).toEqual({ allowed: true });

    clock = 15_500;
    expect(guard.check(7)).toEqual({ allowed: false, resetSeconds: 45 });
  });

  it('should count each user separately', () => {
    for (let call = 0; call < 3; call++) {
      guard.check(7);
    }

    expect(guard.check(7).allowed).toBe(false);
    expect(guard.check(8)).toEqual({ allowed: true });
  });

  it('should admit calls again once the oldest leaves the window', () => {
    for (let call = 0; call < 3; call++) {
      guard.check(7);
    }

    clock = 59_999;
    expect(guard.check(7)).toEqual({ allowed: false, resetSeconds: 1 });
    clock = 60_000;
    expect(guard.check(7)).toEqual({ allowed: true });
  });

  it('should not count refused calls', () => {
    for (let call = 0; call < 3; call++) {
      guard.check(7);
    }
    clock = 30_000;
    guard.check(7);
    guard.check(7);

    clock = 60_001;
    expect(guard.check(7)).toEqual({ allowed: true });
    expect(guard.check(7)).toEqual({ allowed: true });
    expect(guard.check(7)).toEqual({ allowed: true });
  });

  it('should sweep users idle for a whole window', () => {
    guard.check(7);
    clock = 30_000;
    guard.check(8);

    clock = 60_000;
    expect(guard.sweep()).toBe(1);
    expect(guard.sweep()).toBe(0);
  });
});
