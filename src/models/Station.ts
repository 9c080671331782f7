export interface Station {
    id: string,
    name: string,
    lat: number | null,
    lon: number | null,
}
