export interface BuildStatistics {
    malformedRecords: number,
    danglingEdges: number,
    selfLoops: number,
    overwrittenEdges: number,
}
