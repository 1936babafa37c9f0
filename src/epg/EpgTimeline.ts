import type { EpgProgram } from './types';

/**
 * Read-only view over one channel's programmes.
 *
 * The programmes are kept sorted by start time (equal starts keep their input order), so
 * provider data that arrives out of order still answers "now" and "next" correctly.
 * All times are unix seconds.
 */
export class EpgTimeline {
  private readonly programs: readonly EpgProgram[];

  public constructor(programs: readonly EpgProgram[]) {
    this.programs = [...programs].sort((a, b) => a.start - b.start);
  }

  public get size(): number {
    return this.programs.length;
  }

  public all(): readonly EpgProgram[] {
    return this.programs;
  }

  /**
   * First programme with `start <= now < end`.
   */
  public currentProgram(now: number): EpgProgram | null {
    return this.programs.find(program => program.start <= now && now < program.end) ?? null;
  }

  /**
   * Earliest programme starting after `now`.
   */
  public nextProgram(now: number): EpgProgram | null {
    return this.programs.find(program => program.start > now) ?? null;
  }

  /**
   * Programmes starting after `now`, earliest first.
   */
  public upcoming(now: number, limit = Number.POSITIVE_INFINITY): EpgProgram[] {
    const result: EpgProgram[] = [];
    for (const program of this.programs) {
      if (result.length >= limit) {
        break;
      }
      if (program.start > now) {
        result.push(program);
      }
    }
    return result;
  }

  public currentProgress(now: number): number {
    const current = this.currentProgram(now);
    return current ? progress(current, now) : 0;
  }
}

/**
 * Fraction of `program` elapsed at `now`, clamped to [0, 1]. Zero-length and inverted
 * programmes report 0.
 */
export const progress = (program: Pick<EpgProgram, 'start' | 'end'>, now: number): number => {
  if (program.end <= program.start) {
    return 0;
  }
  const fraction = (now - program.start) / (program.end - program.start);
  return Math.min(1, Math.max(0, fraction));
};

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `HH:MM` (UTC) of a unix-seconds timestamp; empty for a zero timestamp.
 */
export const formatClock = (seconds: number): string => {
  if (seconds === 0) {
    return '';
  }
  const secondsInDay = ((seconds % 86_400) + 86_400) % 86_400;
  return `${pad(Math.floor(secondsInDay / 3600))}:${pad(Math.floor((secondsInDay % 3600) / 60))}`;
};
