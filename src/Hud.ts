import type { SimulationClock } from './ECS/World.js'
import { PhysicsConfig } from './ECS/PhysicsConfig.js'

const speedFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

/** Time scale in the largest of years/days/hours that it reaches */
export function formatTimeScale(seconds: number): string {
    const { year, day, hour } = PhysicsConfig
    const [unit, size]: [string, number] =
        seconds >= year ? ['years', year] :
        seconds >= day ? ['days', day] :
        ['hours', hour]
    return `${(seconds / size).toFixed(1)} ${unit}`
}

/**
 * The four on-screen status lines.
 */
export function formatHud(clock: SimulationClock, bodyName: string, speed: number, zoom: number): string[] {
    return [
        `Time Scale: ${formatTimeScale(clock.timeScale)}/frame`,
        `${bodyName} Velocity: ${speedFormat.format(speed / 1000)} km/s`,
        `Zoom: ${zoom.toFixed(1)}x`,
        clock.paused ? 'PAUSED' : 'RUNNING'
    ]
}
