import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { World } from './World.js'
import { SimulationController } from './SimulationController.js'
import { CameraComponent, OrbitState, Position, Trail } from './Components.js'
import type { CameraData, EntityId } from './Components.js'
import { SimulationConfig } from './SimulationConfig.js'
import { createOrbitSystem } from './systems/OrbitSystem.js'
import { AppLog } from '../AppLog.js'
import { loadGalacticCenterScene } from '../scene.js'

describe('SimulationController', () => {
    let world: World
    let controller: SimulationController
    let s2: EntityId
    let camera: CameraData

    beforeEach(() => {
        vi.spyOn(AppLog, 'info').mockImplementation(() => {})
        world = new World()
        world.registerSystem(createOrbitSystem())
        const scene = loadGalacticCenterScene(world)
        s2 = scene.orbiters[0]
        const cam = world.getComponent(scene.camera, CameraComponent)
        if (!cam) throw new Error('missing camera')
        camera = cam
        controller = new SimulationController(world)
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    describe('Pause', () => {
        it('should toggle the paused flag', () => {
            expect(world.clock.paused).toBe(false)
            controller.handle('toggle-pause')
            expect(world.clock.paused).toBe(true)
            controller.handle('toggle-pause')
            expect(world.clock.paused).toBe(false)
        })

        it('should log pause and resume', () => {
            controller.handle('toggle-pause')
            controller.handle('toggle-pause')
            expect(AppLog.info).toHaveBeenNthCalledWith(1, 'Simulation paused')
            expect(AppLog.info).toHaveBeenNthCalledWith(2, 'Simulation resumed')
        })

        it('should leave the orbit untouched while paused', () => {
            controller.frame()
            controller.handle('toggle-pause')

            const state = world.getComponent(s2, OrbitState)
            const pos = world.getComponent(s2, Position)
            const trail = world.getComponent(s2, Trail)
            if (!state || !pos || !trail) throw new Error('missing S2 components')
            const before = { state: { ...state }, pos: pos.copy(), trail: trail.toArray() }

            for (let i = 0; i < 10; i++) controller.frame()

            expect(state).toEqual(before.state)
            expect(pos.x).toBe(before.pos.x)
            expect(pos.y).toBe(before.pos.y)
            expect(trail.toArray()).toEqual(before.trail)
        })
    })

    describe('Frame driver', () => {
        it('should advance simulated time by timeScale per frame', () => {
            controller.frame()
            controller.frame()
            controller.frame()
            expect(world.getComponent(s2, OrbitState)?.elapsedTime).toBe(3 * SimulationConfig.timeScale.initial)
            expect(world.getComponent(s2, Trail)?.length).toBe(3)
        })

        it('should run the visual pass even while paused', () => {
            const update = vi.fn()
            world.registerSystem({ name: 'Probe', phase: 'visual', update })
            controller.handle('toggle-pause')

            controller.frame()

            expect(update).toHaveBeenCalledWith(world, 1 / 60)
        })
    })

    describe('Time scale', () => {
        it('should double and halve per input', () => {
            controller.handle('increase-time-scale')
            expect(world.clock.timeScale).toBe(1280000)
            controller.handle('decrease-time-scale')
            controller.handle('decrease-time-scale')
            expect(world.clock.timeScale).toBe(320000)
        })

        it('should clamp to one hour per frame', () => {
            for (let i = 0; i < 20; i++) controller.handle('decrease-time-scale')
            expect(world.clock.timeScale).toBe(3600)
        })

        it('should clamp to one year per frame', () => {
            for (let i = 0; i < 20; i++) controller.handle('increase-time-scale')
            expect(world.clock.timeScale).toBe(31536000)
        })

        it('should step back up geometrically from the lower bound', () => {
            for (let i = 0; i < 20; i++) controller.handle('decrease-time-scale')
            controller.handle('increase-time-scale')
            expect(world.clock.timeScale).toBe(7200)
        })
    })

    describe('View', () => {
        it('should zoom geometrically by 1.1', () => {
            controller.handle('zoom-in')
            expect(camera.zoom).toBeCloseTo(1.1, 12)
            controller.handle('zoom-out')
            controller.handle('zoom-out')
            expect(camera.zoom).toBeCloseTo(1 / 1.1, 12)
        })

        it('should not bound zoom from above', () => {
            for (let i = 0; i < 100; i++) controller.handle('zoom-in')
            expect(camera.zoom).toBeCloseTo(Math.pow(1.1, 100), 0)
        })

        it('should keep zoom positive', () => {
            camera.zoom = 1e-6
            controller.handle('zoom-out')
            expect(camera.zoom).toBe(1e-6)
        })

        it('should pan by a fixed number of screen pixels', () => {
            camera.zoom = 4
            controller.handle('pan-right')
            controller.handle('pan-down')
            controller.handle('pan-down')
            // 20 px at 4 px/AU = 5 AU
            expect(camera.offset.x).toBe(5)
            expect(camera.offset.y).toBe(10)
            controller.handle('pan-left')
            controller.handle('pan-up')
            expect(camera.offset.x).toBe(0)
            expect(camera.offset.y).toBe(5)
        })

        it('should reset zoom and pan', () => {
            controller.handle('zoom-in')
            controller.handle('pan-left')
            controller.handle('reset-view')
            expect(camera.zoom).toBe(1)
            expect(camera.offset.x).toBe(0)
            expect(camera.offset.y).toBe(0)
        })
    })

    describe('Quit', () => {
        it('should notify quit listeners once and ignore later input', () => {
            const onQuit = vi.fn()
            controller.onQuit(onQuit)

            controller.handle('quit')
            controller.handle('quit')
            controller.handle('toggle-pause')

            expect(controller.running).toBe(false)
            expect(onQuit).toHaveBeenCalledTimes(1)
            expect(world.clock.paused).toBe(false)
        })
    })
})
