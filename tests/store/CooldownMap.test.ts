import { describe, expect, it } from 'vitest';
import { CooldownMap } from '@/store/CooldownMap';

describe('CooldownMap', () => {
  it('should not cool down keys that never failed', () => {
    const cooldowns = new CooldownMap<string>(30_000);
    expect(cooldowns.isCoolingDown('a', 0)).toBe(false);
    expect(cooldowns.remaining('a', 0)).toBe(0);
    expect(cooldowns.lastFailure('a')).toBeNull();
  });

  it('should cool down until the period has fully elapsed', () => {
    const cooldowns = new CooldownMap<string>(30_000);
    cooldowns.recordFailure('a', 100_000);

    expect(cooldowns.isCoolingDown('a', 129_999)).toBe(true);
    expect(cooldowns.remaining('a', 120_000)).toBe(10_000);
    expect(cooldowns.isCoolingDown('a', 130_000)).toBe(false);
    expect(cooldowns.remaining('a', 200_000)).toBe(0);
  });

  it('should restart the period on a later failure', () => {
    const cooldowns = new CooldownMap<string>(30_000);
    cooldowns.recordFailure('a', 0);
    cooldowns.recordFailure('a', 40_000);

    expect(cooldowns.lastFailure('a')).toBe(40_000);
    expect(cooldowns.isCoolingDown('a', 50_000)).toBe(true);
  });

  it('should never cool down with a zero period', () => {
    const cooldowns = new CooldownMap<string>(0);
    cooldowns.recordFailure('a', 10);
    expect(cooldowns.isCoolingDown('a', 10)).toBe(false);
  });

  it('should forget failures on delete and clear', () => {
    const cooldowns = new CooldownMap<string>(30_000);
    cooldowns.recordFailure('a', 0);
    cooldowns.recordFailure('b', 0);

    expect(cooldowns.delete('a')).toBe(true);
    expect(cooldowns.isCoolingDown('a', 1)).toBe(false);
    cooldowns.clear();
    expect(cooldowns.size).toBe(0);
  });
});
