import { Section } from "./Section";

export interface JourneyResponse {
    sourceStop: string,
    targetStop: string,
    totalTime: string,
    totalSeconds: number,
    stops: number,
    sections: Section[],
}
