import type { System } from '../System.js'
import type { World } from '../World.js'
import { CameraComponent, CentralBody, Name, OrbitState, Position, Trail } from '../Components.js'
import { worldToScreen, type ScreenSize } from '../Viewport.js'
import { SimulationConfig, type SimulationSettings } from '../SimulationConfig.js'
import type { IVec2 } from '../../lib/Vector2.js'
import { formatHud } from '../../Hud.js'

export interface CentralBodyView {
    x: number
    y: number
    /** Cosmetic event-horizon ring (pixels) */
    horizonRadius: number
    /** Cosmetic ergosphere ring (pixels) */
    ergosphereRadius: number
}

export interface OrbiterView {
    name: string
    x: number
    y: number
    radius: number
}

/**
 * Everything the presentation layer needs for one frame, in screen pixels.
 */
export interface FrameView {
    central: CentralBodyView | null
    orbiters: OrbiterView[]
    /** One polyline per orbiter, oldest point first */
    trails: IVec2[][]
    hud: string[]
}

/**
 * Draws a FrameView. Implementations own the actual output device.
 */
export interface RenderSurface extends ScreenSize {
    present(frame: FrameView): void
}

/**
 * Builds the FrameView for the current world state and hands it to the surface.
 */
export function composeFrame(world: World, screen: ScreenSize, config: SimulationSettings = SimulationConfig): FrameView | null {
    const cameraEntity = world.querySingle(CameraComponent)
    if (cameraEntity === undefined) return null
    const camera = world.getComponent(cameraEntity, CameraComponent)
    if (!camera) return null

    const { horizonRadius, minHorizonRadius, ergosphereFactor, markerRadius } = config.display
    const project = (x: number, y: number): IVec2 => worldToScreen(camera, screen, x, y)

    let central: CentralBodyView | null = null
    const centralEntity = world.querySingle(CentralBody, Position)
    const centralPos = centralEntity === undefined ? undefined : world.getComponent(centralEntity, Position)
    if (centralPos) {
        const ring = Math.max(minHorizonRadius, horizonRadius * camera.zoom)
        central = { ...project(centralPos.x, centralPos.y), horizonRadius: ring, ergosphereRadius: ring * ergosphereFactor }
    }

    const orbiters: OrbiterView[] = []
    const trails: IVec2[][] = []
    let hudName = ''
    let hudSpeed = 0

    for (const id of world.query(OrbitState, Position)) {
        const pos = world.getComponent(id, Position)
        const state = world.getComponent(id, OrbitState)
        if (!pos || !state) continue
        const name = world.getComponent(id, Name) ?? `#${id}`

        orbiters.push({ name, ...project(pos.x, pos.y), radius: markerRadius })

        const points: IVec2[] = []
        world.getComponent(id, Trail)?.forEach((x, y) => points.push(project(x, y)))
        trails.push(points)

        // HUD tracks the first orbiting body
        if (orbiters.length === 1) {
            hudName = name
            hudSpeed = state.speed
        }
    }

    return {
        central,
        orbiters,
        trails,
        hud: formatHud(world.clock, hudName, hudSpeed, camera.zoom)
    }
}

export function createSceneRenderer(surface: RenderSurface, config: SimulationSettings = SimulationConfig): System {
    return {
        name: 'SceneRenderer',
        phase: 'visual',

        update(world: World, _dt: number): void {
            const frame = composeFrame(world, surface, config)
            if (frame) surface.present(frame)
        }
    }
}
