export const JobStoreTypes = [
    'memory',
    'mongodb'
] as const;

export type JobStoreType = typeof JobStoreTypes[number]
