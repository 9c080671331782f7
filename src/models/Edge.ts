export type EdgeType = 'travel' | 'transfer';

export interface Edge {
    from: string,
    to: string,
    // seconds
    weight: number,
    type: EdgeType,
    // only set for travel edges
    route?: string,
}
