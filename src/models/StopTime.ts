export interface StopTime {
    tripId: string,
    arrivalTime: number | undefined,
    departureTime: number | undefined,
    stopId: string,
    stopSequence: number,
}
