// Core ECS exports
export { World, type SimulationClock } from './World.js'
export type { System, SystemPhase } from './System.js'
export { Ticker } from './Ticker.js'
export { SimulationController, type InputEvent, type InputSource } from './SimulationController.js'

// Components
export {
    Name,
    Position,
    CentralBody,
    Orbit,
    OrbitState,
    Trail,
    CameraComponent,
    type EntityId,
    type OrbitalElements,
    type CentralBodyData,
    type OrbitData,
    type OrbitStateData,
    type CameraData,
    type ComponentTypes,
    type ComponentKey
} from './Components.js'

// Utilities
export { TrailBuffer } from './TrailBuffer.js'
export { PhysicsConfig, type PhysicsConstants } from './PhysicsConfig.js'
export { SimulationConfig, type SimulationSettings } from './SimulationConfig.js'
export { worldToScreen, screenToWorld, type ScreenSize } from './Viewport.js'
export { createOrbitalElements, createCentralBody, type OrbitalElementsInput } from './bodies.js'

// Systems
export * from './systems/index.js'
