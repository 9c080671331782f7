// Record shapes of the schedule store tables consumed by the graph builder.

export interface StopRecord {
    stop_id: string,
    stop_name: string,
    stop_lat: number | null,
    stop_lon: number | null,
}

export interface TripSegmentRecord {
    from_stop_id: string,
    to_stop_id: string,
    // minimum observed duration in seconds, null if no trip had valid times
    weight: number | null,
    route_id: string,
}

export interface TransferRecord {
    from_stop_id: string,
    to_stop_id: string,
    // values <= 0 or null mean "use the default transfer time"
    min_transfer_time: number | null,
}
