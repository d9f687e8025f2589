// Barrel-файл модуля результатов.
export type { SegmentResult, GroupItem, ConversationGroup } from './types.js';
export { formatTimestamp, toWholeSeconds } from './time.js';
export { extractVideoId, buildDeepLink } from './video-link.js';
export { ResultAggregator, toSegmentResult, groupFetchSize } from './aggregator.js';
export { formatSearchResponse } from './format.js';
