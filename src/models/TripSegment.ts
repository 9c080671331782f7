// Two consecutive stops of a single trip.
export interface TripSegment {
    tripId: string,
    fromStopId: string,
    toStopId: string,
    startTime: number | undefined,
    endTime: number | undefined,
    duration: number | undefined,
    routeId: string,
    serviceId: string,
    directionId: number | null,
}
