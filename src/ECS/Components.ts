import type Vec2 from '../lib/Vector2.js'
import type { TrailBuffer } from './TrailBuffer.js'

export type EntityId = number

// Component type symbols for type-safe component access
export const Name = Symbol('Name')
export const Position = Symbol('Position')
export const CentralBody = Symbol('CentralBody')
export const Orbit = Symbol('Orbit')
export const OrbitState = Symbol('OrbitState')
export const Trail = Symbol('Trail')
export const CameraComponent = Symbol('Camera')

/** Static shape of an elliptical orbit. Frozen once built. */
export interface OrbitalElements {
    readonly semiMajorAxis: number     // meters
    readonly eccentricity: number      // 0..1
    readonly period: number            // seconds
    readonly semiMinorAxis: number     // meters
    readonly focalDistance: number     // meters
    readonly periapsis: number         // meters
    readonly apoapsis: number          // meters
}

export interface CentralBodyData {
    readonly mass: number                  // kg
    readonly schwarzschildRadius: number   // meters
    readonly spinParameter: number         // meters, J / (M c)
}

export interface OrbitData {
    readonly elements: OrbitalElements
    /** Entity carrying the CentralBody this orbit is around */
    readonly primary: EntityId
}

export interface OrbitStateData {
    elapsedTime: number         // seconds since periapsis
    meanAnomaly: number         // radians, [0, 2π)
    eccentricAnomaly: number    // radians
    trueAnomaly: number         // radians
    radius: number              // meters
    speed: number               // m/s
    converged: boolean
    iterations: number
}

export interface CameraData {
    zoom: number     // pixels per AU
    offset: Vec2     // pan, in AU
}

// Type mapping from symbols to their data types
export interface ComponentTypes {
    [Name]: string
    [Position]: Vec2
    [CentralBody]: CentralBodyData
    [Orbit]: OrbitData
    [OrbitState]: OrbitStateData
    [Trail]: TrailBuffer
    [CameraComponent]: CameraData
}

// Helper type for component keys
export type ComponentKey = keyof ComponentTypes

