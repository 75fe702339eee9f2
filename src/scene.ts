import Vec2 from './lib/Vector2.js'
import {
    World,
    Name,
    Position,
    CentralBody,
    Orbit,
    OrbitState,
    Trail,
    CameraComponent,
    TrailBuffer,
    PhysicsConfig,
    SimulationConfig,
    createCentralBody,
    createOrbitalElements,
    propagateOrbit,
    type EntityId,
    type OrbitalElementsInput,
    type PhysicsConstants,
    type SimulationSettings
} from './ECS/index.js'

/** Sagittarius A* mass in solar masses */
export const SGR_A_SOLAR_MASSES = 4.154e6

/** Elements of S2, expressed in the given unit scales */
export function s2Elements(constants: PhysicsConstants = PhysicsConfig): OrbitalElementsInput {
    return {
        semiMajorAxis: 120 * constants.AU,
        eccentricity: 0.884,
        period: 16 * constants.julianYear
    }
}

export interface SceneEntities {
    centralBody: EntityId
    orbiters: EntityId[]
    camera: EntityId
}

/**
 * Adds an orbiting body at periapsis (elapsed time 0), with its state already
 * consistent with the Kepler relation.
 */
export function addOrbitingBody(
    world: World,
    name: string,
    elementsInput: OrbitalElementsInput,
    primary: EntityId,
    config: SimulationSettings = SimulationConfig,
    constants: PhysicsConstants = PhysicsConfig
): EntityId {
    const central = world.getComponent(primary, CentralBody)
    if (!central) {
        throw new Error(`Cannot add ${name}: entity ${primary} has no CentralBody`)
    }
    const elements = createOrbitalElements(elementsInput)
    const { x, y, ...state } = propagateOrbit(elements, constants.G * central.mass, 0, config.solver)

    const id = world.createEntity()
    world.addComponent(id, Name, name)
    world.addComponent(id, Orbit, { elements, primary })
    world.addComponent(id, OrbitState, state)
    world.addComponent(id, Position, new Vec2(x, y))
    world.addComponent(id, Trail, new TrailBuffer(config.trailCapacity))
    return id
}

/**
 * Sagittarius A* at the origin, S2 on its orbit, and a camera centred on the black hole.
 */
export function loadGalacticCenterScene(
    world: World,
    config: SimulationSettings = SimulationConfig,
    constants: PhysicsConstants = PhysicsConfig
): SceneEntities {
    const centralBody = world.createEntity()
    world.addComponent(centralBody, Name, 'Sgr A*')
    world.addComponent(centralBody, CentralBody, createCentralBody(SGR_A_SOLAR_MASSES * constants.solarMass, constants))
    world.addComponent(centralBody, Position, Vec2.zero())

    const s2 = addOrbitingBody(world, 'S2', s2Elements(constants), centralBody, config, constants)

    const camera = world.createEntity()
    world.addComponent(camera, CameraComponent, { zoom: config.zoom.initial, offset: Vec2.zero() })

    return { centralBody, orbiters: [s2], camera }
}
