import { createPresetOptions } from '../Options';
import type { Options } from '../Options';
import { RequestCoordinator } from '../RequestCoordinator';
import { createEpgFetcher } from '../sources/xtream';
import type { XtreamCredentials, XtreamEpgSource } from '../sources/xtream';
import LibLogger from '../logger';
import { EpgTimeline, progress } from './EpgTimeline';
import type { EpgProgram } from './types';

const logger = LibLogger.get('EpgGuide');

export interface EpgGuideOptions
  extends Partial<Pick<Options<string, EpgProgram[]>, 'ttl' | 'cooldown' | 'now' | 'discardStaleDeliveries'>> {
  source: XtreamEpgSource;
}

/**
 * Per-channel programme guide: the EPG cache keyed by stream id, plus "now playing" and
 * "up next" answers from whatever is cached. Query methods take unix seconds and default to
 * the guide's clock.
 */
export class EpgGuide {
  public readonly coordinator: RequestCoordinator<string, EpgProgram[]>;

  private readonly source: XtreamEpgSource;
  private readonly now: () => number;
  private readonly timelines = new WeakMap<EpgProgram[], EpgTimeline>();

  public constructor(options: EpgGuideOptions) {
    const { source, ...timing } = options;
    this.source = source;
    this.coordinator = new RequestCoordinator(createPresetOptions<string, EpgProgram[]>('epg', {
      ...timing,
      name: 'epg',
      fetcher: createEpgFetcher(source),
      accepts: streamId => streamId.trim() !== '' && this.source.hasCredentials
    }));
    this.now = this.coordinator.options.now;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  public request(streamId: string): void {
    this.coordinator.request(streamId);
  }

  /**
   * Request every stream on the visible page.
   */
  public requestBatch(streamIds: Iterable<string>): void {
    this.coordinator.requestMany(streamIds);
  }

  public processPending(): number {
    return this.coordinator.processPending();
  }

  public isLoading(streamId: string): boolean {
    return this.coordinator.isLoading(streamId);
  }

  public programs(streamId: string): EpgProgram[] | null {
    return this.coordinator.get(streamId);
  }

  public timeline(streamId: string): EpgTimeline | null {
    const programs = this.coordinator.get(streamId);
    if (!programs) {
      return null;
    }
    let timeline = this.timelines.get(programs);
    if (!timeline) {
      timeline = new EpgTimeline(programs);
      this.timelines.set(programs, timeline);
    }
    return timeline;
  }

  public currentProgram(streamId: string, at: number = this.nowSeconds()): EpgProgram | null {
    return this.timeline(streamId)?.currentProgram(at) ?? null;
  }

  public nextProgram(streamId: string, at: number = this.nowSeconds()): EpgProgram | null {
    return this.timeline(streamId)?.nextProgram(at) ?? null;
  }

  /**
   * Progress of the programme currently airing on `streamId`; 0 when nothing is.
   */
  public progress(streamId: string, at: number = this.nowSeconds()): number {
    const current = this.currentProgram(streamId, at);
    return current ? progress(current, at) : 0;
  }

  /**
   * True when some cached channel has gone stale.
   */
  public needsRefresh(): boolean {
    return this.coordinator.keys().some(streamId => !this.coordinator.isFresh(streamId));
  }

  public refreshAll(): void {
    this.coordinator.refreshAll();
  }

  /**
   * Switch provider. Listings from the old provider are dropped, including those still in flight.
   */
  public setCredentials(credentials: XtreamCredentials | null): void {
    this.source.setCredentials(credentials);
    this.coordinator.clear({ discardInFlight: true });
    logger.info('EPG credentials changed', { configured: credentials !== null });
  }

  public lastError(): string | null {
    return this.coordinator.lastError();
  }

  public clear(): void {
    this.coordinator.clear();
  }

  public close(): void {
    this.coordinator.close();
  }
}
