export { EpgGuide } from './EpgGuide';
export type { EpgGuideOptions } from './EpgGuide';
export { EpgTimeline, formatClock, progress } from './EpgTimeline';
export type { EpgProgram } from './types';
