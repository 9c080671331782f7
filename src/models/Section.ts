export interface Section {
    departureStop: string,
    arrivalStop: string,
    duration: string,
    type: string,
    route?: string,
}
