export interface Trip {
    id: string,
    routeId: string,
    serviceId: string,
    directionId: number | null,
}
