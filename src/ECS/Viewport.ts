import type { CameraData } from './Components.js'
import type { IVec2 } from '../lib/Vector2.js'
import { PhysicsConfig } from './PhysicsConfig.js'

export interface ScreenSize {
    width: number
    height: number
}

/**
 * Affine map from simulation space (meters) to screen pixels.
 * World lengths are first normalized by `unit` (AU), then panned and zoomed about the screen centre.
 */
export function worldToScreen(
    camera: CameraData,
    screen: ScreenSize,
    x: number,
    y: number,
    unit: number = PhysicsConfig.AU
): IVec2 {
    return {
        x: screen.width / 2 + (x / unit - camera.offset.x) * camera.zoom,
        y: screen.height / 2 + (y / unit - camera.offset.y) * camera.zoom
    }
}

/** Inverse of worldToScreen */
export function screenToWorld(
    camera: CameraData,
    screen: ScreenSize,
    sx: number,
    sy: number,
    unit: number = PhysicsConfig.AU
): IVec2 {
    return {
        x: ((sx - screen.width / 2) / camera.zoom + camera.offset.x) * unit,
        y: ((sy - screen.height / 2) / camera.zoom + camera.offset.y) * unit
    }
}
