export { TrackerSampleReader } from './TrackerSampleReader';
export type { TrackerReadResult, TrackerSampleSource } from './types';
