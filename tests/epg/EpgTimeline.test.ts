import { describe, expect, it } from 'vitest';
import { EpgTimeline, formatClock, progress } from '@/epg/EpgTimeline';
import type { EpgProgram } from '@/epg/types';

const program = (title: string, start: number, end: number): EpgProgram => ({
  id: title,
  channelId: 'news.test',
  title,
  description: '',
  language: 'en',
  start,
  end,
  hasArchive: false
});

const A = program('A', 100, 200);
const B = program('B', 200, 300);
const C = program('C', 300, 400);

describe('EpgTimeline', () => {
  const timeline = new EpgTimeline([A, B, C]);

  describe('currentProgram', () => {
    it('should find the programme airing now', () => {
      expect(timeline.currentProgram(250)).toBe(B);
    });

    it('should hand over exactly at a boundary', () => {
      expect(timeline.currentProgram(200)).toBe(B);
      expect(timeline.currentProgram(100)).toBe(A);
    });

    it('should return null outside the guide', () => {
      expect(timeline.currentProgram(99)).toBeNull();
      expect(timeline.currentProgram(400)).toBeNull();
    });

    it('should return null for an empty guide', () => {
      expect(new EpgTimeline([]).currentProgram(250)).toBeNull();
    });
  });

  describe('nextProgram', () => {
    it('should find the next programme to start', () => {
      expect(timeline.nextProgram(250)).toBe(C);
      expect(timeline.nextProgram(50)).toBe(A);
    });

    it('should return null after the last start', () => {
      expect(timeline.nextProgram(300)).toBeNull();
    });
  });

  describe('unsorted data', () => {
    it('should answer from start order, not input order', () => {
      const shuffled = new EpgTimeline([C, A, B]);

      expect(shuffled.all()).toEqual([A, B, C]);
      expect(shuffled.currentProgram(250)).toBe(B);
      expect(shuffled.nextProgram(150)).toBe(B);
    });

    it('should keep input order for equal starts', () => {
      const first = program('first', 100, 150);
      const second = program('second', 100, 200);

      expect(new EpgTimeline([first, second]).currentProgram(120)).toBe(first);
      expect(new EpgTimeline([second, first]).currentProgram(120)).toBe(second);
    });

    it('should not reorder the caller\'s array', () => {
      const input = [C, A, B];
      new EpgTimeline(input);
      expect(input).toEqual([C, A, B]);
    });
  });

  describe('upcoming', () => {
    it('should list later programmes up to the limit', () => {
      expect(timeline.upcoming(150)).toEqual([B, C]);
      expect(timeline.upcoming(50, 2)).toEqual([A, B]);
      expect(timeline.upcoming(400)).toEqual([]);
    });
  });

  describe('currentProgress', () => {
    it('should report progress of the current programme', () => {
      expect(timeline.currentProgress(250)).toBe(0.5);
      expect(timeline.currentProgress(500)).toBe(0);
    });
  });
});

describe('progress', () => {
  it('should be the elapsed fraction', () => {
    expect(progress(B, 250)).toBe(0.5);
    expect(progress(B, 275)).toBe(0.75);
  });

  it('should clamp to [0, 1]', () => {
    expect(progress(B, 100)).toBe(0);
    expect(progress(B, 1000)).toBe(1);
  });

  it('should be zero for empty or inverted programmes', () => {
    expect(progress(program('empty', 200, 200), 200)).toBe(0);
    expect(progress(program('inverted', 300, 200), 250)).toBe(0);
  });
});

describe('formatClock', () => {
  it('should format UTC hours and minutes', () => {
    expect(formatClock(1700000000)).toBe('22:13');
    expect(formatClock(0)).toBe('');
  });
});
