import { describe, it, expect, beforeEach } from 'vitest'
import { World, CameraComponent, CentralBody, Name, Orbit, OrbitState, Position, Trail, PhysicsConfig } from './ECS/index.js'
import { addOrbitingBody, loadGalacticCenterScene, s2Elements } from './scene.js'

describe('loadGalacticCenterScene', () => {
    let world: World

    beforeEach(() => {
        world = new World()
    })

    it('should create Sgr A*, S2 and a camera', () => {
        const scene = loadGalacticCenterScene(world)

        expect(world.getEntityCount()).toBe(3)
        expect(world.getComponent(scene.centralBody, Name)).toBe('Sgr A*')
        expect(world.getComponent(scene.centralBody, CentralBody)?.mass).toBeCloseTo(4.154e6 * 1.989e30, -30)
        expect(world.getComponent(scene.centralBody, Position)).toEqual({ x: 0, y: 0 })
        expect(world.getComponent(scene.orbiters[0], Name)).toBe('S2')
        expect(world.getComponent(scene.camera, CameraComponent)).toEqual({ zoom: 1, offset: { x: 0, y: 0 } })
    })

    it('should give S2 its published elements', () => {
        const scene = loadGalacticCenterScene(world)
        const orbit = world.getComponent(scene.orbiters[0], Orbit)

        expect(orbit?.primary).toBe(scene.centralBody)
        expect(orbit?.elements.semiMajorAxis).toBe(120 * PhysicsConfig.AU)
        expect(orbit?.elements.eccentricity).toBe(0.884)
        expect(orbit?.elements.period).toBe(16 * 365.25 * 86400)
    })

    it('should start S2 at periapsis with an empty trail', () => {
        const scene = loadGalacticCenterScene(world)
        const s2 = scene.orbiters[0]
        const state = world.getComponent(s2, OrbitState)
        const pos = world.getComponent(s2, Position)

        expect(state?.elapsedTime).toBe(0)
        expect(state?.trueAnomaly).toBe(0)
        expect(state?.speed).toBeGreaterThan(0)
        expect(pos?.x).toBe(state?.radius)
        expect(pos?.y).toBe(0)
        expect(world.getComponent(s2, Trail)?.length).toBe(0)
        expect(world.getComponent(s2, Trail)?.capacity).toBe(500)
    })
})

describe('addOrbitingBody', () => {
    it('should reject a primary without a CentralBody', () => {
        const world = new World()
        const rock = world.createEntity()
        expect(() => addOrbitingBody(world, 'S1', s2Elements(), rock)).toThrow(`Cannot add S1: entity ${rock} has no CentralBody`)
    })
})
