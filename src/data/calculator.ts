export class Calculator {
    /**
     * Calculates the great-circle distance between two coordinates with the haversine formula.
     * The result has the unit of the given radius.
     * @param lat1
     * @param lon1
     * @param lat2
     * @param lon2
     * @param radius
     * @returns
     */
    public static haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number, radius: number): number {
        const phi1 = this.toRadians(lat1);
        const phi2 = this.toRadians(lat2);
        const dPhi = this.toRadians(lat2 - lat1);
        const dLambda = this.toRadians(lon2 - lon1);
        const a = Math.sin(dPhi / 2) * Math.sin(dPhi / 2) +
            Math.cos(phi1) * Math.cos(phi2) *
            Math.sin(dLambda / 2) * Math.sin(dLambda / 2);
        const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
        return radius * c;
    }

    private static toRadians(degrees: number): number {
        return degrees * (Math.PI / 180);
    }
}
