// default minimum transfer time in seconds, used when a transfer record has none
export const DEFAULT_TRANSFER_TIME = 180;

// radius of the earth in meters
export const EARTH_RADIUS_METERS = 6371000;

// assumed maximum cruising speed in meters per second (approx. 36 km/h)
export const ASSUMED_SPEED_MPS = 10;

export const DEFAULT_PORT = 1337;

export const DEFAULT_CORS_ORIGIN = 'http://localhost:4200';
