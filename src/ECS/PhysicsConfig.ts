/**
 * Physical constants and unit scales.
 * Passed into factories as the default value so tests can swap in synthetic bodies.
 */
export interface PhysicsConstants {
    /** Gravitational constant (m³/kg/s²) */
    readonly G: number
    /** Speed of light (m/s) */
    readonly c: number
    /** Astronomical unit (m) */
    readonly AU: number
    /** Solar mass (kg) */
    readonly solarMass: number
    /** Dimensionless spin of the central black hole, J = χ G M² / c */
    readonly spin: number
    readonly hour: number
    readonly day: number
    /** 365-day year, used for time-scale display and bounds */
    readonly year: number
    /** Julian year (365.25 days), used for orbital periods */
    readonly julianYear: number
}

export const PhysicsConfig = {
    G: 6.6743e-11,
    c: 3e8,
    AU: 1.496e11,
    solarMass: 1.989e30,
    spin: 0.616,

    hour: 3600,
    day: 86400,
    year: 31536000,
    julianYear: 365.25 * 86400
} as const satisfies PhysicsConstants
