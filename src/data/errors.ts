/**
 * Thrown when the schedule data can't be read or contains no stops. Fatal for a planning session.
 */
export class DataUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DataUnavailableError';
    }
}
