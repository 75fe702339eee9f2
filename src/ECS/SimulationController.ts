import type { World } from './World.js'
import { CameraComponent } from './Components.js'
import type { CameraData } from './Components.js'
import { SimulationConfig, type SimulationSettings } from './SimulationConfig.js'
import { AppLog } from '../AppLog.js'
import { clamp } from '../lib/common.js'

export type InputEvent =
    | 'quit'
    | 'toggle-pause'
    | 'zoom-in'
    | 'zoom-out'
    | 'increase-time-scale'
    | 'decrease-time-scale'
    | 'pan-left'
    | 'pan-right'
    | 'pan-up'
    | 'pan-down'
    | 'reset-view'

/**
 * Anything that can deliver discrete input events: a keyboard, a script, a test.
 */
export interface InputSource {
    onEvent(listener: (event: InputEvent) => void): void
    close(): void
}

type QuitListener = () => void

/**
 * Maps discrete input onto the world's clock and camera, and drives one step per frame.
 *
 * The clock's timeScale is simulated seconds per step; whoever calls frame() picks the cadence.
 */
export class SimulationController {
    private quitListeners: QuitListener[] = []
    private _running = true

    constructor(
        private world: World,
        private config: SimulationSettings = SimulationConfig
    ) {}

    get running(): boolean {
        return this._running
    }

    onQuit(listener: QuitListener): void {
        this.quitListeners.push(listener)
    }

    handle(event: InputEvent): void {
        if (!this._running) return

        const clock = this.world.clock
        switch (event) {
            case 'quit':
                this._running = false
                AppLog.info('Quit requested')
                for (const listener of this.quitListeners) listener()
                break
            case 'toggle-pause':
                clock.paused = !clock.paused
                AppLog.info(clock.paused ? 'Simulation paused' : 'Simulation resumed')
                break
            case 'increase-time-scale':
                this.setTimeScale(clock.timeScale * this.config.timeScale.step)
                break
            case 'decrease-time-scale':
                this.setTimeScale(clock.timeScale / this.config.timeScale.step)
                break
            case 'zoom-in':
                this.withCamera(camera => {
                    camera.zoom *= this.config.zoom.step
                })
                break
            case 'zoom-out':
                this.withCamera(camera => {
                    camera.zoom = Math.max(camera.zoom / this.config.zoom.step, this.config.zoom.min)
                })
                break
            case 'pan-left':
                this.pan(-1, 0)
                break
            case 'pan-right':
                this.pan(1, 0)
                break
            case 'pan-up':
                this.pan(0, -1)
                break
            case 'pan-down':
                this.pan(0, 1)
                break
            case 'reset-view':
                this.withCamera(camera => {
                    camera.zoom = this.config.zoom.initial
                    camera.offset.set(0, 0)
                })
                break
        }
    }

    /**
     * One frame: a simulation step of timeScale seconds unless paused, then the visual pass.
     */
    frame(): void {
        const clock = this.world.clock
        if (!clock.paused) {
            this.world.step(clock.timeScale)
        }
        this.world.updateVisuals(1 / this.config.frameRate)
    }

    private setTimeScale(value: number): void {
        const { min, max } = this.config.timeScale
        this.world.clock.timeScale = clamp(value, min, max)
    }

    private pan(dx: number, dy: number): void {
        this.withCamera(camera => {
            // Constant on-screen distance regardless of zoom
            const step = this.config.panStep / camera.zoom
            camera.offset.x += dx * step
            camera.offset.y += dy * step
        })
    }

    private withCamera(apply: (camera: CameraData) => void): void {
        const id = this.world.querySingle(CameraComponent)
        if (id === undefined) return
        const camera = this.world.getComponent(id, CameraComponent)
        if (camera) apply(camera)
    }
}
