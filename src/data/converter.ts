export class Converter {
    /**
     * Converts a given gtfs time (HH:MM:SS) to its number of seconds since 00:00:00.
     * Times after midnight of the service day (e.g. 25:30:00) are allowed.
     * Returns undefined if the time can't be parsed.
     * @param time
     * @returns
     */
    public static timeToSeconds(time: string | undefined): number | undefined {
        if(!time){
            return undefined;
        }
        const match = /^(\d+):(\d{2}):(\d{2})$/.exec(time.trim());
        if(!match){
            return undefined;
        }
        let timeInSeconds = 0;
        //hours
        timeInSeconds += Number(match[1]) * 3600;
        //minutes
        timeInSeconds += Number(match[2]) * 60;
        //seconds
        timeInSeconds += Number(match[3]);
        return timeInSeconds;
    }

    /**
     * Transforms a duration in seconds to a HH:MM:SS string. Durations longer than a day are not wrapped.
     * @param durationInSeconds
     * @returns
     */
    public static secondsToDuration(durationInSeconds: number): string {
        let remaining = Math.floor(durationInSeconds);
        let duration = '';
        // calculates hours and minutes
        let divider = 3600;
        for(let i = 0; i < 2; i++){
            const calculation = Math.floor(remaining/divider);
            duration += this.pad(calculation) + ':';
            remaining = remaining % divider;
            divider = divider/60;
        }
        // seconds are equal to the remaining part
        duration += this.pad(remaining);
        return duration;
    }

    private static pad(value: number): string {
        if(value < 10){
            return '0' + value;
        }
        return value.toString();
    }
}
