/**
 * One programme in a channel's guide. Times are unix seconds.
 */
export interface EpgProgram {
  id: string;
  channelId: string;
  title: string;
  description: string;
  language: string;
  start: number;
  end: number;
  /** Catch-up recording available from the provider */
  hasArchive: boolean;
}
