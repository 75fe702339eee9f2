import type { CentralBodyData, OrbitalElements } from './Components.js'
import { PhysicsConfig, type PhysicsConstants } from './PhysicsConfig.js'

export interface OrbitalElementsInput {
    semiMajorAxis: number   // meters
    eccentricity: number
    period: number          // seconds
}

/**
 * Build a frozen element set, deriving the ellipse's minor axis, focal distance and apsides.
 * Invalid shapes are configuration errors and throw.
 */
export function createOrbitalElements({ semiMajorAxis, eccentricity, period }: OrbitalElementsInput): OrbitalElements {
    if (!(semiMajorAxis > 0) || !Number.isFinite(semiMajorAxis)) {
        throw new Error(`Semi-major axis must be a positive finite length, got ${semiMajorAxis}`)
    }
    if (!(eccentricity >= 0 && eccentricity < 1)) {
        throw new Error(`Eccentricity must be in [0, 1) for a bound orbit, got ${eccentricity}`)
    }
    if (!(period > 0) || !Number.isFinite(period)) {
        throw new Error(`Orbital period must be a positive finite duration, got ${period}`)
    }

    const semiMinorAxis = semiMajorAxis * Math.sqrt(1 - eccentricity * eccentricity)
    // a² - b² can round slightly negative for e ≈ 0
    const focalDistance = Math.sqrt(Math.max(0, semiMajorAxis * semiMajorAxis - semiMinorAxis * semiMinorAxis))

    return Object.freeze({
        semiMajorAxis,
        eccentricity,
        period,
        semiMinorAxis,
        focalDistance,
        periapsis: semiMajorAxis * (1 - eccentricity),
        apoapsis: semiMajorAxis * (1 + eccentricity)
    })
}

/**
 * Non-rotating-horizon description of a black hole of the given mass.
 * The spin parameter is informational; the dynamics are pure two-body Kepler.
 */
export function createCentralBody(mass: number, constants: PhysicsConstants = PhysicsConfig): CentralBodyData {
    if (!(mass > 0) || !Number.isFinite(mass)) {
        throw new Error(`Central body mass must be a positive finite value, got ${mass}`)
    }
    const { G, c, spin } = constants
    const angularMomentum = spin * G * mass * mass / c

    return Object.freeze({
        mass,
        schwarzschildRadius: 2 * G * mass / (c * c),
        spinParameter: angularMomentum / (mass * c)
    })
}
