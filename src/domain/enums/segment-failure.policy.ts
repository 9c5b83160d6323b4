// What a split does when one segment cannot be extracted
export const SegmentFailurePolicies = [
    'abort', // fail the whole split
    'skip'   // drop the segment and keep going
] as const;

export type SegmentFailurePolicy = typeof SegmentFailurePolicies[number]
